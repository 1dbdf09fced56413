import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export type HealthStatus = 'healthy' | 'unhealthy';

export class ComponentHealthDto {
  @ApiProperty({ description: 'Component status', enum: ['healthy', 'unhealthy'], example: 'healthy' })
  status: HealthStatus;

  @ApiProperty({ description: 'Latency in milliseconds', example: 2 })
  latencyMs: number;

  @ApiPropertyOptional({ description: 'Error message', example: 'Timeout' })
  message?: string;

  constructor(status: HealthStatus, latencyMs: number, message?: string) {
    this.status = status;
    this.latencyMs = latencyMs;
    this.message = message;
  }
}

export class HealthResponseDto {
  @ApiProperty({ description: 'Overall application status', enum: ['healthy', 'unhealthy'], example: 'healthy' })
  status: HealthStatus;

  @ApiProperty({ description: 'Check timestamp', example: '2025-01-15T10:30:00.000Z' })
  timestamp: string;

  @ApiProperty({ description: 'Database check', type: ComponentHealthDto })
  database: ComponentHealthDto;

  constructor(database: ComponentHealthDto, timestamp: Date = new Date()) {
    this.status = database.status;
    this.timestamp = timestamp.toISOString();
    this.database = database;
  }
}
