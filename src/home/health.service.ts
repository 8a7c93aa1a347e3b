import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  BlobStoreHealth,
  BlobStorePort,
} from '../documents/domain/ports/blob-store.port';
import { withTimeout } from '../utils/with-timeout';

export type ComponentStatus = 'healthy' | 'unhealthy';

export interface HealthReport {
  status: 'ok' | 'degraded';
  database: { status: ComponentStatus; error?: string };
  storage: BlobStoreHealth;
}

const PROBE_TIMEOUT_MS = 5000;

/**
 * Health Check Service
 *
 * Reachability of the database and the blob store, for load balancers and
 * monitoring. Probe errors are reported, never thrown.
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly blobStore: BlobStorePort,
  ) {}

  async check(): Promise<HealthReport> {
    const [database, storage] = await Promise.all([
      this.checkDatabase(),
      this.checkStorage(),
    ]);

    const status =
      database.status === 'healthy' && storage.status === 'healthy'
        ? 'ok'
        : 'degraded';
    if (status === 'degraded') {
      this.logger.warn(
        `Health degraded: database=${database.status} storage=${storage.status}`,
      );
    }

    return { status, database, storage };
  }

  private async checkDatabase(): Promise<HealthReport['database']> {
    try {
      await withTimeout(
        this.dataSource.query('SELECT 1'),
        PROBE_TIMEOUT_MS,
        'Database probe',
      );
      return { status: 'healthy' };
    } catch (error) {
      return {
        status: 'unhealthy',
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async checkStorage(): Promise<BlobStoreHealth> {
    try {
      return await withTimeout(
        this.blobStore.healthCheck(),
        PROBE_TIMEOUT_MS,
        'Blob store probe',
      );
    } catch (error) {
      return {
        status: 'unhealthy',
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
