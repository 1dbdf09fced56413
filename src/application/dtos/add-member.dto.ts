import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsString } from 'class-validator';
import { Major } from '@/domain/value-objects';

export class AddMemberDto {
  @ApiProperty({ description: 'Member name', example: 'Paul McCartney' })
  @IsString({ message: 'name must be a string' })
  name!: string;

  @ApiProperty({ description: 'Member age', example: 20 })
  @IsInt({ message: 'age must be an integer' })
  age!: number;

  @ApiProperty({ description: 'Academic year', example: 2, minimum: 1, maximum: 4 })
  @IsInt({ message: 'grade must be an integer' })
  grade!: number;

  @ApiProperty({ description: 'Field of study', enum: Major, example: Major.Music })
  @IsString({ message: 'major must be a string' })
  major!: string;
}
