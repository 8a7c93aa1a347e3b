import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../src/config/config.type';
import { DocumentsConfig } from '../../src/documents/config/documents-config.type';
import { Document } from '../../src/documents/domain/entities/document.entity';
import { IncomingFile } from '../../src/documents/domain/utils/file-classifier.util';
import { User } from '../../src/users/domain/user';
import { Actor } from '../../src/utils/actor-extractor.util';
import { InMemoryStore } from './in-memory-persistence';

export const TEST_JWT_SECRET = 'test-secret';

export const TEST_DOCUMENTS_CONFIG: DocumentsConfig = {
  maxFileSizeBytes: 1024 * 1024,
  allowedExtensions: ['pdf', 'txt', 'md', 'png', 'docx'],
  presignTtlSeconds: 900,
  blobTimeoutMs: 1000,
  maxConcurrentBlobOperations: 8,
  defaultPageSize: 20,
  maxPageSize: 50,
  storage: {
    bucket: 'test-bucket',
    keyPrefix: 'documents/',
  },
};

/**
 * ConfigService backed by fixed values; nothing is read from the
 * environment.
 */
export function createTestConfigService(
  documents: Partial<DocumentsConfig> = {},
): ConfigService<AllConfigType> {
  return new ConfigService<AllConfigType>({
    auth: { secret: TEST_JWT_SECRET, expires: '15m' },
    documents: { ...TEST_DOCUMENTS_CONFIG, ...documents },
  });
}

export function seedUser(
  store: InMemoryStore,
  overrides: Partial<User> = {},
): User {
  const now = store.now();
  const id = overrides.id ?? randomUUID();
  const user: User = {
    id,
    email: `user-${id.substring(0, 8)}@example.com`,
    passwordHash: 'not-a-real-hash',
    firstName: 'Test',
    lastName: 'User',
    isActive: true,
    lastLoginAt: null,
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
  store.users.set(user.id, user);
  return user;
}

export function seedDocument(
  store: InMemoryStore,
  ownerId: string,
  overrides: Partial<Document> = {},
): Document {
  const now = store.now();
  const document: Document = {
    id: randomUUID(),
    title: 'Quarterly report',
    description: null,
    ownerId,
    currentVersionId: null,
    fileType: 'pdf',
    isDeleted: false,
    deletedAt: null,
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
  store.documents.set(document.id, document);
  return document;
}

export function actorFor(user: Pick<User, 'id'>): Actor {
  return { id: user.id, ipAddress: '127.0.0.1', userAgent: 'jest' };
}

export function makeFile(
  originalName = 'report.pdf',
  content = '%PDF-1.4 test content',
  mimeType = 'application/pdf',
): IncomingFile {
  const buffer = Buffer.from(content);
  return { originalName, mimeType, size: buffer.length, buffer };
}
