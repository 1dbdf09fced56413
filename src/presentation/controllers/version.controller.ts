import { Controller, Get, Header } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { APP_VERSION } from '@/infrastructure/config/app.constants';

@Controller()
@ApiTags('health')
export class VersionController {
  @Get()
  @Header('Content-Type', 'text/plain; charset=utf-8')
  @ApiOperation({ summary: 'Service version' })
  @ApiOkResponse({ description: 'Version string', schema: { type: 'string', example: APP_VERSION } })
  getVersion(): string {
    return APP_VERSION;
  }
}
