import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';

export interface DatabaseHealth {
  status: 'healthy' | 'unhealthy';
  latencyMs?: number;
  error?: string;
}

/**
 * Health Check Service
 *
 * Used by monitoring systems and load balancers to verify service health.
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(private readonly dataSource: DataSource) {}

  async checkDatabaseHealth(): Promise<DatabaseHealth> {
    if (!this.dataSource.isInitialized) {
      return {
        status: 'unhealthy',
        error: 'Database connection not initialized',
      };
    }

    const startedAt = Date.now();
    try {
      await this.dataSource.query('SELECT 1');
      return { status: 'healthy', latencyMs: Date.now() - startedAt };
    } catch (error) {
      // Connection errors can carry host names, keep them out of the response
      this.logger.error(
        `[HEALTH] Database check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { status: 'unhealthy', error: 'Database query failed' };
    }
  }
}
