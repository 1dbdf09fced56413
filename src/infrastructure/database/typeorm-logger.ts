import { Logger, QueryRunner } from 'typeorm';
import { LoggerService } from '@/infrastructure/logger';

/** Routes TypeORM output through LoggerService under the `Database` context. */
export class TypeOrmLogger implements Logger {
  constructor(private readonly logger: LoggerService = new LoggerService('Database')) {}

  logQuery(query: string, parameters?: unknown[], _queryRunner?: QueryRunner) {
    this.logger.debug(query, withParameters(parameters));
  }

  logQueryError(error: string | Error, query: string, parameters?: unknown[], _queryRunner?: QueryRunner) {
    this.logger.error(typeof error === 'string' ? error : error.message, {
      query,
      ...withParameters(parameters),
    });
  }

  logQuerySlow(time: number, query: string, parameters?: unknown[], _queryRunner?: QueryRunner) {
    this.logger.warn(`Slow query (${time}ms)`, { query, ...withParameters(parameters) });
  }

  logSchemaBuild(message: string, _queryRunner?: QueryRunner) {
    this.logger.log(message);
  }

  logMigration(message: string, _queryRunner?: QueryRunner) {
    this.logger.log(message);
  }

  log(level: 'log' | 'info' | 'warn', message: unknown, _queryRunner?: QueryRunner) {
    if (level === 'warn') {
      this.logger.warn(String(message));
    } else {
      this.logger.log(String(message));
    }
  }
}

function withParameters(parameters?: unknown[]): { parameters?: unknown[] } {
  return parameters?.length ? { parameters } : {};
}
