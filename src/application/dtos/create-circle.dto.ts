import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsString } from 'class-validator';
import { Major } from '@/domain/value-objects';

/** Shape check only; value rules (grade range, major, capacity) are enforced by the domain. */
export class CreateCircleDto {
  @ApiProperty({ description: 'Circle name', example: 'Music club' })
  @IsString({ message: 'circle_name must be a string' })
  circle_name!: string;

  @ApiProperty({ description: 'Maximum headcount, owner included', example: 10, minimum: 1 })
  @IsInt({ message: 'capacity must be an integer' })
  capacity!: number;

  @ApiProperty({ description: 'Owner name', example: 'John Lennon' })
  @IsString({ message: 'owner_name must be a string' })
  owner_name!: string;

  @ApiProperty({ description: 'Owner age', example: 21, minimum: 1 })
  @IsInt({ message: 'owner_age must be an integer' })
  owner_age!: number;

  @ApiProperty({ description: 'Owner academic year', example: 3, minimum: 1, maximum: 4 })
  @IsInt({ message: 'owner_grade must be an integer' })
  owner_grade!: number;

  @ApiProperty({ description: 'Owner field of study', enum: Major, example: Major.Music })
  @IsString({ message: 'owner_major must be a string' })
  owner_major!: string;
}
