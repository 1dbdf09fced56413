import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { ComponentHealthDto, HealthResponseDto } from '@/application/dtos/health-response.dto';

/** Timeout in milliseconds for the database probe */
const DATABASE_TIMEOUT_MS = 3000;

/** Health check service for liveness probes. */
@Injectable()
export class HealthService {
  constructor(private readonly dataSource: DataSource) {}

  async check(): Promise<HealthResponseDto> {
    const database = await this.checkDatabase();
    return new HealthResponseDto(database);
  }

  /** Runs `SELECT 1` against the store. */
  private async checkDatabase(): Promise<ComponentHealthDto> {
    const start = Date.now();
    try {
      await this.withTimeout(this.dataSource.query('SELECT 1'), DATABASE_TIMEOUT_MS);
      return new ComponentHealthDto('healthy', Date.now() - start);
    } catch (error) {
      return new ComponentHealthDto(
        'unhealthy',
        Date.now() - start,
        error instanceof Error ? error.message : 'Database check failed',
      );
    }
  }

  /** Rejects when `operation` has not settled after `ms`; the timer is always cleared. */
  private async withTimeout<T>(operation: Promise<T>, ms: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Timeout')), ms);
    });

    try {
      return await Promise.race([operation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
