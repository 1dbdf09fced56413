import { Controller, Get, HttpCode, HttpStatus, ServiceUnavailableException } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiServiceUnavailableResponse, ApiTags } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { HealthResponseDto } from '@/application/dtos';
import { HealthService } from '@/application/services';

@Controller('health')
@ApiTags('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { ttl: 60000, limit: 30 } })
  @ApiOperation({
    summary: 'Liveness check',
    description: 'Checks that the application can reach its database. Rate limit: 30 req/min.',
  })
  @ApiOkResponse({ description: 'Application is healthy', type: HealthResponseDto })
  @ApiServiceUnavailableResponse({ description: 'Database is unreachable' })
  async check(): Promise<HealthResponseDto> {
    const health = await this.healthService.check();

    if (health.status === 'unhealthy') {
      throw new ServiceUnavailableException(`Database unavailable: ${health.database.message ?? 'unknown error'}`);
    }

    return health;
  }
}
