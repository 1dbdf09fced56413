import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, IsString } from 'class-validator';

export class UpdateCircleDto {
  @ApiPropertyOptional({ description: 'New circle name', example: 'Football club' })
  @IsOptional()
  @IsString({ message: 'circle_name must be a string' })
  circle_name?: string | null;

  @ApiPropertyOptional({ description: 'New capacity', example: 20 })
  @IsOptional()
  @IsInt({ message: 'capacity must be an integer' })
  capacity?: number | null;
}
