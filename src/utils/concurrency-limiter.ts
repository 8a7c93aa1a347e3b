import { DomainError } from './errors/domain-error';

/**
 * Caps the number of in-flight operations. Calls beyond the cap are
 * rejected with StorageUnavailable instead of queueing.
 *
 * A slot is held until the operation itself settles, even when the caller
 * stopped waiting for it (see withTimeout).
 */
export class ConcurrencyLimiter {
  private active = 0;

  constructor(
    private readonly limit: number,
    private readonly name: string,
  ) {}

  get inFlight(): number {
    return this.active;
  }

  async run<T>(operation: () => Promise<T>): Promise<T> {
    if (this.active >= this.limit) {
      throw DomainError.storageUnavailable(
        `Too many concurrent ${this.name} operations`,
      );
    }

    this.active += 1;
    try {
      return await operation();
    } finally {
      this.active -= 1;
    }
  }
}
