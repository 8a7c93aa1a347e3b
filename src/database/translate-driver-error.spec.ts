import { Logger } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { guardQuery, translateDriverError } from './translate-driver-error';
import { DomainError, ErrorKind } from '../utils/errors/domain-error';

function driverError(code: string, extra: Record<string, string> = {}): Error {
  return Object.assign(new Error(`driver failure ${code}`), { code, ...extra });
}

describe('translateDriverError', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should turn a unique violation into Conflict with the constraint name', () => {
    const error = new QueryFailedError(
      'INSERT INTO document_permissions ...',
      [],
      driverError('23505', {
        constraint: 'UQ_document_permissions_document_user',
      }),
    );

    const translated = translateDriverError(error);

    expect(translated).toBeInstanceOf(DomainError);
    expect(translated).toMatchObject({
      kind: ErrorKind.Conflict,
      message: 'Record already exists',
      details: { constraint: 'UQ_document_permissions_document_user' },
    });
  });

  it('should turn other query failures into StorageUnavailable', () => {
    const error = new QueryFailedError(
      'SELECT 1',
      [],
      driverError('42P01'),
    );

    expect(translateDriverError(error)).toMatchObject({
      kind: ErrorKind.StorageUnavailable,
      message: 'Persistence store unavailable',
    });
  });

  it.each(['22001', '22003', '23503', '23514'])(
    'should turn non-retryable failure %s into Internal',
    (code) => {
      const error = new QueryFailedError(
        'INSERT INTO document_versions ...',
        [],
        driverError(code),
      );

      expect(translateDriverError(error)).toMatchObject({
        kind: ErrorKind.Internal,
        message: 'Internal error',
      });
    },
  );

  it('should turn connection failures into StorageUnavailable', () => {
    expect(translateDriverError(driverError('ECONNREFUSED'))).toMatchObject({
      kind: ErrorKind.StorageUnavailable,
    });
    expect(
      translateDriverError(
        new Error('timeout exceeded when trying to connect'),
      ),
    ).toMatchObject({ kind: ErrorKind.StorageUnavailable });
  });

  it('should return domain and unrelated errors unchanged', () => {
    const domain = DomainError.notFound('Document');
    const unrelated = new TypeError('x is not a function');

    expect(translateDriverError(domain)).toBe(domain);
    expect(translateDriverError(unrelated)).toBe(unrelated);
  });
});

describe('guardQuery', () => {
  it('should resolve with the query result', async () => {
    await expect(guardQuery(async () => 3)).resolves.toBe(3);
  });

  it('should rethrow translated driver errors', async () => {
    await expect(
      guardQuery(async () => {
        throw new QueryFailedError('INSERT', [], driverError('23505'));
      }),
    ).rejects.toMatchObject({
      kind: ErrorKind.Conflict,
      message: 'Record already exists',
    });
  });
});
