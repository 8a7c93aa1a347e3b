import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Bucket, Storage } from '@google-cloud/storage';
import * as path from 'path';
import {
  BlobStoreHealth,
  BlobStorePort,
  StoredBlob,
} from '../../domain/ports/blob-store.port';
import { AllConfigType } from '../../../config/config.type';
import { DomainError } from '../../../utils/errors/domain-error';

/**
 * GCP Cloud Storage Adapter
 *
 * Credentials:
 * - GOOGLE_APPLICATION_CREDENTIALS pointing at a service account key is
 *   required for signed URLs
 * - Without it the client falls back to Application Default Credentials;
 *   uploads work, presigning does not
 *
 * Object keys are never logged above DEBUG.
 */
@Injectable()
export class GcpBlobStoreAdapter implements BlobStorePort {
  private readonly logger = new Logger(GcpBlobStoreAdapter.name);
  private readonly storage: Storage;
  private readonly bucket: Bucket;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    const credentialsPathEnv = process.env.GOOGLE_APPLICATION_CREDENTIALS;
    const credentialsPath = credentialsPathEnv
      ? path.isAbsolute(credentialsPathEnv)
        ? credentialsPathEnv
        : path.resolve(process.cwd(), credentialsPathEnv)
      : undefined;

    if (credentialsPath) {
      this.storage = new Storage({ keyFilename: credentialsPath });
    } else {
      this.logger.warn(
        'GOOGLE_APPLICATION_CREDENTIALS not set. Using ADC; signed URL generation will fail.',
      );
      this.storage = new Storage();
    }

    this.bucket = this.storage.bucket(
      this.configService.getOrThrow('documents.storage.bucket', {
        infer: true,
      }),
    );
  }

  async put(
    key: string,
    content: Buffer,
    contentType: string,
  ): Promise<StoredBlob> {
    try {
      await this.bucket.file(key).save(content, {
        contentType,
        resumable: content.length > 5 * 1024 * 1024,
        metadata: { uploadedAt: new Date().toISOString() },
      });

      this.logger.debug(
        `Stored blob ${key} (${(content.length / 1024).toFixed(2)} KB)`,
      );
      return { key, size: content.length };
    } catch (error) {
      this.logger.error(`Failed to store blob: ${this.sanitizeError(error)}`);
      throw DomainError.storageUnavailable('Failed to store file content');
    }
  }

  async presign(key: string, expiresInSeconds: number): Promise<string> {
    try {
      const [url] = await this.bucket.file(key).getSignedUrl({
        version: 'v4',
        action: 'read',
        expires: Date.now() + expiresInSeconds * 1000,
      });

      this.logger.debug(`Generated signed URL (expires in ${expiresInSeconds}s)`);
      return url;
    } catch (error) {
      this.logger.error(
        `Failed to generate signed URL: ${this.sanitizeError(error)}`,
      );
      throw DomainError.storageUnavailable('Failed to generate download URL');
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.bucket.file(key).delete({ ignoreNotFound: true });
      this.logger.debug(`Deleted blob ${key}`);
    } catch (error) {
      this.logger.error(`Failed to delete blob: ${this.sanitizeError(error)}`);
      throw DomainError.storageUnavailable('Failed to delete file content');
    }
  }

  async healthCheck(): Promise<BlobStoreHealth> {
    try {
      const [exists] = await this.bucket.exists();
      if (!exists) {
        return {
          status: 'unhealthy',
          bucket: this.bucket.name,
          error: 'Bucket does not exist',
        };
      }
      return { status: 'healthy', bucket: this.bucket.name };
    } catch (error) {
      return {
        status: 'unhealthy',
        bucket: this.bucket.name,
        error: this.sanitizeError(error),
      };
    }
  }

  /**
   * Strips gs:// URIs and signed URL query strings from error messages
   */
  private sanitizeError(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    return message
      .replace(/gs:\/\/[^\s]+/g, 'gs://[REDACTED]')
      .replace(/X-Goog-[A-Za-z-]+=[^&\s]+/g, 'X-Goog-[REDACTED]');
  }
}
