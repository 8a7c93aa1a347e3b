import { Logger } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { DomainError, ErrorKind } from '../utils/errors/domain-error';

const UNIQUE_VIOLATION = '23505';

// SQLSTATE classes 22 (data exception) and 23 (integrity constraint
// violation) fail the same way on every retry
const NON_RETRYABLE_CLASSES = ['22', '23'];

// Connection-level failures reported by pg / node sockets
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
  '08000',
  '08003',
  '08006',
]);

const POOL_TIMEOUT_PATTERN =
  /timeout exceeded when trying to connect|Connection terminated/i;

const logger = new Logger('PersistenceStore');

function readStringProperty(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const property: unknown = Reflect.get(value, key);
  return typeof property === 'string' ? property : undefined;
}

/**
 * Converts driver failures into DomainErrors.
 *
 * Unique violations become Conflict, data and constraint violations become
 * Internal, and every other query or connection failure becomes
 * StorageUnavailable. DomainErrors and unrelated exceptions are returned
 * unchanged.
 */
export function translateDriverError(error: unknown): unknown {
  if (error instanceof DomainError) {
    return error;
  }

  if (error instanceof QueryFailedError) {
    const code = readStringProperty(error.driverError, 'code');

    if (code === UNIQUE_VIOLATION) {
      const constraint = readStringProperty(error.driverError, 'constraint');
      return new DomainError(
        ErrorKind.Conflict,
        'Record already exists',
        constraint ? { constraint } : undefined,
      );
    }

    logger.error(`Query failed (code ${code ?? 'unknown'}): ${error.message}`);
    if (
      code !== undefined &&
      NON_RETRYABLE_CLASSES.includes(code.slice(0, 2))
    ) {
      return DomainError.internal();
    }
    return DomainError.storageUnavailable('Persistence store unavailable');
  }

  if (error instanceof Error) {
    const code = readStringProperty(error, 'code');
    if (
      (code !== undefined && CONNECTION_ERROR_CODES.has(code)) ||
      POOL_TIMEOUT_PATTERN.test(error.message)
    ) {
      logger.error(`Connection failure: ${error.message}`);
      return DomainError.storageUnavailable('Persistence store unavailable');
    }
  }

  return error;
}

/**
 * Runs a repository query and rethrows driver failures as DomainErrors.
 */
export async function guardQuery<T>(query: () => Promise<T>): Promise<T> {
  try {
    return await query();
  } catch (error) {
    throw translateDriverError(error);
  }
}
