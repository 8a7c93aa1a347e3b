import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { createHash } from 'crypto';
import { DocumentLifecycleDomainService } from './document-lifecycle.domain.service';
import { VersionAllocatorDomainService } from './version-allocator.domain.service';
import { BlobStorePort } from '../ports/blob-store.port';
import { PermissionEngine } from '../../../permissions/domain/services/permission-engine.domain.service';
import { PermissionRole } from '../../../permissions/domain/entities/permission-role.enum';
import { ActivityRecorderService } from '../../../activity/activity-recorder.service';
import { ActivityAction } from '../../../activity/domain/entities/activity-action.enum';
import { UnitOfWork } from '../../../database/unit-of-work';
import { DomainError, ErrorKind } from '../../../utils/errors/domain-error';
import { User } from '../../../users/domain/user';
import {
  InMemoryDocumentTagRepository,
  InMemoryPersistenceModule,
  InMemoryStore,
} from '../../../../test/utils/in-memory-persistence';
import { InMemoryBlobStore } from '../../../../test/utils/in-memory-blob-store';
import {
  actorFor,
  createTestConfigService,
  makeFile,
  seedUser,
} from '../../../../test/utils/test-fixtures';

describe('DocumentLifecycleDomainService', () => {
  let service: DocumentLifecycleDomainService;
  let permissionEngine: PermissionEngine;
  let unitOfWork: UnitOfWork;
  let store: InMemoryStore;
  let blobStore: InMemoryBlobStore;
  let owner: User;
  let editor: User;
  let reader: User;

  beforeEach(async () => {
    store = new InMemoryStore();
    blobStore = new InMemoryBlobStore();

    const module: TestingModule = await Test.createTestingModule({
      imports: [InMemoryPersistenceModule.forStore(store)],
      providers: [
        DocumentLifecycleDomainService,
        VersionAllocatorDomainService,
        PermissionEngine,
        ActivityRecorderService,
        { provide: BlobStorePort, useValue: blobStore },
        { provide: ConfigService, useValue: createTestConfigService() },
      ],
    }).compile();

    service = module.get<DocumentLifecycleDomainService>(
      DocumentLifecycleDomainService,
    );
    permissionEngine = module.get<PermissionEngine>(PermissionEngine);
    unitOfWork = module.get<UnitOfWork>(UnitOfWork);

    owner = seedUser(store, { email: 'owner@example.com' });
    editor = seedUser(store, { email: 'editor@example.com' });
    reader = seedUser(store, { email: 'reader@example.com' });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const createShared = async (): Promise<string> => {
    const { document } = await service.create(
      actorFor(owner),
      { title: 'Quarterly report' },
      makeFile(),
    );
    await permissionEngine.grant(
      document.id,
      actorFor(owner),
      editor.id,
      PermissionRole.EDIT,
    );
    await permissionEngine.grant(
      document.id,
      actorFor(owner),
      reader.id,
      PermissionRole.READ,
    );
    return document.id;
  };

  const activityFor = (documentId: string) =>
    [...store.activity.values()].filter(
      (entry) => entry.documentId === documentId,
    );

  describe('create', () => {
    it('should store the blob and create the document with version 1', async () => {
      const file = makeFile('report.pdf', 'first draft');

      const details = await service.create(
        actorFor(owner),
        {
          title: '  Quarterly report  ',
          description: 'Q3 numbers',
          tags: [' Finance ', 'q3', 'finance', ''],
        },
        file,
      );

      expect(details.document).toMatchObject({
        title: 'Quarterly report',
        description: 'Q3 numbers',
        ownerId: owner.id,
        fileType: 'pdf',
        isDeleted: false,
      });
      expect(details.tags).toEqual(['finance', 'q3']);
      expect(details.currentVersion).toMatchObject({
        documentId: details.document.id,
        versionNumber: 1,
        fileName: 'report.pdf',
        fileSize: 11,
        mimeType: 'application/pdf',
        checksum: createHash('sha256').update('first draft').digest('hex'),
        createdById: owner.id,
      });
      expect(details.document.currentVersionId).toBe(
        details.currentVersion?.id,
      );

      const [blobKey] = [...blobStore.objects.keys()];
      expect(blobKey).toMatch(
        new RegExp(`^documents/${details.document.id}/[0-9a-f-]{36}/report\\.pdf$`),
      );
      expect(details.currentVersion?.blobKey).toBe(blobKey);
      expect(blobStore.objects.get(blobKey)?.content.toString()).toBe(
        'first draft',
      );
    });

    it('should record an upload activity entry', async () => {
      const { document } = await service.create(
        actorFor(owner),
        { title: 'Report' },
        makeFile('report.pdf', 'abc'),
      );

      expect(activityFor(document.id)).toEqual([
        expect.objectContaining({
          actorId: owner.id,
          action: ActivityAction.UPLOAD,
          details: {
            versionNumber: 1,
            fileName: 'report.pdf',
            fileSize: 3,
            fileType: 'pdf',
          },
        }),
      ]);
    });

    it('should store an empty description as null', async () => {
      const { document } = await service.create(
        actorFor(owner),
        { title: 'Report', description: '   ' },
        makeFile(),
      );

      expect(document.description).toBeNull();
    });

    it('should reject a blank title before touching the blob store', async () => {
      await expect(
        service.create(actorFor(owner), { title: '   ' }, makeFile()),
      ).rejects.toMatchObject({
        kind: ErrorKind.InvalidInput,
        message: 'Title must not be empty',
      });
      expect(blobStore.objects.size).toBe(0);
    });

    it('should reject a disallowed file type', async () => {
      await expect(
        service.create(
          actorFor(owner),
          { title: 'Tool' },
          makeFile('setup.exe', 'MZ', 'application/octet-stream'),
        ),
      ).rejects.toMatchObject({
        kind: ErrorKind.InvalidInput,
        message: 'File type is not allowed',
      });
      expect(blobStore.objects.size).toBe(0);
      expect(store.documents.size).toBe(0);
    });

    it('should leave no rows when the blob upload fails', async () => {
      jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      jest
        .spyOn(blobStore, 'put')
        .mockRejectedValueOnce(new Error('socket hang up'));

      await expect(
        service.create(actorFor(owner), { title: 'Report' }, makeFile()),
      ).rejects.toMatchObject({
        kind: ErrorKind.StorageUnavailable,
        message: 'Blob upload failed',
      });
      expect(store.documents.size).toBe(0);
      expect(store.versions.size).toBe(0);
      expect(store.activity.size).toBe(0);
    });

    it('should log the orphaned blob when the transaction fails', async () => {
      const warn = jest
        .spyOn(Logger.prototype, 'warn')
        .mockImplementation(() => undefined);
      jest
        .spyOn(unitOfWork, 'run')
        .mockRejectedValueOnce(
          DomainError.storageUnavailable('Persistence store unavailable'),
        );

      await expect(
        service.create(actorFor(owner), { title: 'Report' }, makeFile()),
      ).rejects.toMatchObject({ kind: ErrorKind.StorageUnavailable });

      const [blobKey] = [...blobStore.objects.keys()];
      const documentId = blobKey.split('/')[1];
      expect(warn).toHaveBeenCalledWith(
        `Orphaned blob ${blobKey}: transaction for document ${documentId} failed`,
      );
      expect(store.documents.size).toBe(0);
    });

    it('should roll back every row when a later step of the transaction fails', async () => {
      jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      jest
        .spyOn(InMemoryDocumentTagRepository.prototype, 'replace')
        .mockRejectedValueOnce(
          DomainError.storageUnavailable('Persistence store unavailable'),
        );

      await expect(
        service.create(
          actorFor(owner),
          { title: 'Report', tags: ['draft'] },
          makeFile(),
        ),
      ).rejects.toMatchObject({ kind: ErrorKind.StorageUnavailable });

      expect(store.documents.size).toBe(0);
      expect(store.versions.size).toBe(0);
      expect(store.tags.size).toBe(0);
      expect(blobStore.objects.size).toBe(1);
    });
  });

  describe('uploadNewVersion', () => {
    it('should add the next version and make it current', async () => {
      const documentId = await createShared();

      const details = await service.uploadNewVersion(
        documentId,
        actorFor(editor),
        makeFile('report-v2.pdf', 'second draft'),
      );

      expect(details.currentVersion).toMatchObject({
        versionNumber: 2,
        fileName: 'report-v2.pdf',
        createdById: editor.id,
      });
      expect(details.document.currentVersionId).toBe(
        details.currentVersion?.id,
      );

      const versions = await service.listVersions(documentId, actorFor(reader));
      expect(versions.map((version) => version.versionNumber)).toEqual([2, 1]);

      expect(activityFor(documentId).pop()).toMatchObject({
        actorId: editor.id,
        action: ActivityAction.UPLOAD_VERSION,
        details: { versionNumber: 2, fileName: 'report-v2.pdf', fileSize: 12 },
      });
    });

    it('should require EDIT', async () => {
      const documentId = await createShared();

      await expect(
        service.uploadNewVersion(documentId, actorFor(reader), makeFile()),
      ).rejects.toMatchObject({ kind: ErrorKind.Forbidden });
      expect(blobStore.objects.size).toBe(1);
    });

    it('should accept the upload once the reader is upgraded to EDIT', async () => {
      const documentId = await createShared();
      const [original] = await service.listVersions(
        documentId,
        actorFor(owner),
      );

      await expect(
        service.uploadNewVersion(
          documentId,
          actorFor(reader),
          makeFile('report-v2.pdf', 'second draft'),
        ),
      ).rejects.toMatchObject({ kind: ErrorKind.Forbidden });

      await permissionEngine.updateRole(
        documentId,
        actorFor(owner),
        reader.id,
        PermissionRole.EDIT,
      );
      const details = await service.uploadNewVersion(
        documentId,
        actorFor(reader),
        makeFile('report-v2.pdf', 'second draft'),
      );

      expect(details.currentVersion).toMatchObject({
        versionNumber: 2,
        createdById: reader.id,
      });
      const versions = await service.listVersions(documentId, actorFor(owner));
      expect(versions.map((version) => version.versionNumber)).toEqual([2, 1]);
      expect(versions[1]).toEqual(original);
    });

    it('should reject a file whose type differs from the document', async () => {
      const documentId = await createShared();

      await expect(
        service.uploadNewVersion(
          documentId,
          actorFor(owner),
          makeFile('notes.txt', 'plain text', 'text/plain'),
        ),
      ).rejects.toMatchObject({
        kind: ErrorKind.InvalidInput,
        message: 'File type must match the document file type',
        details: { expected: 'pdf', received: 'txt' },
      });
      expect(blobStore.objects.size).toBe(1);
    });

    it('should number concurrent uploads contiguously', async () => {
      const documentId = await createShared();

      const results = await Promise.all(
        [1, 2, 3, 4, 5].map((n) =>
          service.uploadNewVersion(
            documentId,
            actorFor(n % 2 === 0 ? owner : editor),
            makeFile(`report-${n}.pdf`, `content ${n}`),
          ),
        ),
      );

      const numbers = results
        .map((details) => details.currentVersion?.versionNumber)
        .sort((a, b) => (a ?? 0) - (b ?? 0));
      expect(numbers).toEqual([2, 3, 4, 5, 6]);

      const versions = await service.listVersions(documentId, actorFor(owner));
      expect(versions.map((version) => version.versionNumber)).toEqual([
        6, 5, 4, 3, 2, 1,
      ]);

      const { document } = await service.getDocument(
        documentId,
        actorFor(owner),
      );
      expect(document.currentVersionId).toBe(versions[0].id);
    });
  });

  describe('updateMetadata', () => {
    it('should update only the given fields', async () => {
      const documentId = await createShared();

      const details = await service.updateMetadata(
        documentId,
        actorFor(editor),
        { title: 'Annual report', tags: ['Final'] },
      );

      expect(details.document.title).toBe('Annual report');
      expect(details.document.description).toBeNull();
      expect(details.tags).toEqual(['final']);
      expect(details.currentVersion?.versionNumber).toBe(1);
      expect(activityFor(documentId).pop()).toMatchObject({
        action: ActivityAction.UPDATE,
        details: { fields: ['title', 'tags'] },
      });
    });

    it('should clear the description when given null', async () => {
      const { document } = await service.create(
        actorFor(owner),
        { title: 'Report', description: 'Draft' },
        makeFile(),
      );

      const details = await service.updateMetadata(
        document.id,
        actorFor(owner),
        { description: null },
      );

      expect(details.document.description).toBeNull();
      expect(details.document.title).toBe('Report');
    });

    it('should require EDIT', async () => {
      const documentId = await createShared();

      await expect(
        service.updateMetadata(documentId, actorFor(reader), { title: 'x' }),
      ).rejects.toMatchObject({ kind: ErrorKind.Forbidden });
    });
  });

  describe('softDelete', () => {
    it('should hide the document from everyone but the owner', async () => {
      const documentId = await createShared();

      await service.softDelete(documentId, actorFor(owner));

      const { document } = await service.getDocument(
        documentId,
        actorFor(owner),
      );
      expect(document.isDeleted).toBe(true);
      expect(document.deletedAt).toBeInstanceOf(Date);

      await expect(
        service.getDocument(documentId, actorFor(editor)),
      ).rejects.toMatchObject({ kind: ErrorKind.NotFound });
      await expect(
        service.getDownloadTarget(documentId, actorFor(owner)),
      ).rejects.toMatchObject({ kind: ErrorKind.NotFound });

      const page = await service.list(actorFor(owner), {});
      expect(page.total).toBe(0);

      expect(store.versions.size).toBe(1);
      expect(blobStore.objects.size).toBe(1);
      expect(activityFor(documentId).pop()).toMatchObject({
        action: ActivityAction.DELETE,
        details: {},
      });
    });

    it('should reject a second delete as NotFound', async () => {
      const documentId = await createShared();
      await service.softDelete(documentId, actorFor(owner));

      await expect(
        service.softDelete(documentId, actorFor(owner)),
      ).rejects.toMatchObject({ kind: ErrorKind.NotFound });
    });

    it('should require ADMIN', async () => {
      const documentId = await createShared();

      await expect(
        service.softDelete(documentId, actorFor(editor)),
      ).rejects.toMatchObject({ kind: ErrorKind.Forbidden });
    });
  });

  describe('getDownloadTarget', () => {
    it('should presign the current version by default', async () => {
      const documentId = await createShared();
      await service.uploadNewVersion(
        documentId,
        actorFor(editor),
        makeFile('report-v2.pdf', 'second draft'),
      );
      const versions = await service.listVersions(documentId, actorFor(owner));

      const target = await service.getDownloadTarget(
        documentId,
        actorFor(reader),
      );

      expect(target).toEqual({
        url: `https://blobs.test/${versions[0].blobKey}?expires=900`,
        expiresIn: 900,
        versionNumber: 2,
        fileName: 'report-v2.pdf',
        mimeType: 'application/pdf',
        fileSize: 12,
        checksum: createHash('sha256').update('second draft').digest('hex'),
      });
    });

    it('should presign an older version on request', async () => {
      const documentId = await createShared();
      await service.uploadNewVersion(documentId, actorFor(editor), makeFile());

      const target = await service.getDownloadTarget(
        documentId,
        actorFor(reader),
        1,
      );

      expect(target.versionNumber).toBe(1);
    });

    it('should reject an unknown version number', async () => {
      const documentId = await createShared();

      await expect(
        service.getDownloadTarget(documentId, actorFor(reader), 9),
      ).rejects.toMatchObject({
        kind: ErrorKind.NotFound,
        message: 'Version not found',
      });
    });

    it('should report a failing blob store as StorageUnavailable', async () => {
      const documentId = await createShared();
      jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      jest
        .spyOn(blobStore, 'presign')
        .mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await expect(
        service.getDownloadTarget(documentId, actorFor(reader)),
      ).rejects.toMatchObject({
        kind: ErrorKind.StorageUnavailable,
        message: 'Blob presign failed',
      });
    });

    it('should deny users without access', async () => {
      const documentId = await createShared();
      const stranger = seedUser(store);

      await expect(
        service.getDownloadTarget(documentId, actorFor(stranger)),
      ).rejects.toMatchObject({ kind: ErrorKind.Forbidden });
    });
  });

  describe('list', () => {
    beforeEach(async () => {
      await service.create(
        actorFor(owner),
        { title: 'Budget 2025', tags: ['finance'] },
        makeFile('budget.pdf'),
      );
      await service.create(
        actorFor(owner),
        { title: 'Meeting notes', tags: ['team'] },
        makeFile('notes.md', '# notes', 'text/markdown'),
      );
      const { document } = await service.create(
        actorFor(editor),
        { title: 'Budget draft', tags: ['finance', 'draft'] },
        makeFile('draft.pdf'),
      );
      await permissionEngine.grant(
        document.id,
        actorFor(editor),
        owner.id,
        PermissionRole.READ,
      );
      await service.create(
        actorFor(editor),
        { title: 'Private budget' },
        makeFile('private.pdf'),
      );
    });

    it('should list owned and shared documents, newest first', async () => {
      const page = await service.list(actorFor(owner), {});

      expect(page.total).toBe(3);
      expect(page.page).toBe(1);
      expect(page.limit).toBe(20);
      expect(page.data.map((summary) => summary.document.title)).toEqual([
        'Budget draft',
        'Meeting notes',
        'Budget 2025',
      ]);
      expect(page.data[0].tags).toEqual(['finance', 'draft']);
    });

    it('should filter by title, tag and file type', async () => {
      const byTitle = await service.list(actorFor(owner), { title: ' budget ' });
      expect(byTitle.data.map((summary) => summary.document.title)).toEqual([
        'Budget draft',
        'Budget 2025',
      ]);

      const byTag = await service.list(actorFor(owner), { tags: ['TEAM'] });
      expect(byTag.data.map((summary) => summary.document.title)).toEqual([
        'Meeting notes',
      ]);

      const byType = await service.list(actorFor(owner), { fileType: '.PDF' });
      expect(byType.total).toBe(2);
    });

    it('should filter by owner', async () => {
      const page = await service.list(actorFor(owner), { ownerId: editor.id });

      expect(page.total).toBe(1);
      expect(page.data.map((summary) => summary.document.title)).toEqual([
        'Budget draft',
      ]);
    });

    it('should include the current version of each document', async () => {
      const notes = (await service.list(actorFor(owner), { tags: ['team'] }))
        .data[0].document;
      await service.uploadNewVersion(
        notes.id,
        actorFor(owner),
        makeFile('notes-v2.md', '# notes v2', 'text/markdown'),
      );

      const page = await service.list(actorFor(owner), {});

      expect(
        page.data.map((summary) => [
          summary.document.title,
          summary.currentVersion?.versionNumber,
          summary.currentVersion?.fileSize,
        ]),
      ).toEqual([
        ['Budget draft', 1, 21],
        ['Meeting notes', 2, 10],
        ['Budget 2025', 1, 21],
      ]);
    });

    it('should page and clamp the page size', async () => {
      const second = await service.list(actorFor(owner), { page: 2, limit: 2 });
      expect(second.total).toBe(3);
      expect(second.data.map((summary) => summary.document.title)).toEqual([
        'Budget 2025',
      ]);

      const clamped = await service.list(actorFor(owner), {
        page: 0,
        limit: 500,
      });
      expect(clamped.page).toBe(1);
      expect(clamped.limit).toBe(50);
    });
  });
});
