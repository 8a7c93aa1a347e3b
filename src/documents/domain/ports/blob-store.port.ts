export interface StoredBlob {
  key: string;
  size: number;
}

export interface BlobStoreHealth {
  status: 'healthy' | 'unhealthy';
  bucket?: string;
  error?: string;
}

/**
 * Object storage holding version content, addressed by opaque keys.
 * Adapters reject with a StorageUnavailable DomainError on failure.
 */
export abstract class BlobStorePort {
  abstract put(
    key: string,
    content: Buffer,
    contentType: string,
  ): Promise<StoredBlob>;

  /**
   * Time-limited read URL for the object
   */
  abstract presign(key: string, expiresInSeconds: number): Promise<string>;

  /**
   * Removes the object. Deleting a missing key succeeds.
   */
  abstract delete(key: string): Promise<void>;

  abstract healthCheck(): Promise<BlobStoreHealth>;
}
