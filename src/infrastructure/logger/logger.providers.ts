import { Provider, Scope } from '@nestjs/common';
import { LOGGER_SERVICE } from '@/domain/services';
import { LoggerService } from './custom-logger.service';

/**
 * Binds LOGGER_SERVICE to LoggerService.
 * Transient: every consumer gets its own instance.
 */
export const loggerProviders: Provider[] = [
  {
    provide: LOGGER_SERVICE,
    useFactory: () => new LoggerService(),
    scope: Scope.TRANSIENT,
  },
];
