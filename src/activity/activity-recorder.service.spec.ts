import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ActivityRecorderService } from './activity-recorder.service';
import { ActivityLogRepository } from './domain/repositories/activity-log.repository.port';
import { ActivityAction } from './domain/entities/activity-action.enum';

describe('ActivityRecorderService', () => {
  let service: ActivityRecorderService;
  let repository: jest.Mocked<ActivityLogRepository>;

  beforeEach(async () => {
    repository = {
      create: jest.fn(),
      findByDocumentId: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ActivityRecorderService,
        { provide: ActivityLogRepository, useValue: repository },
      ],
    }).compile();

    service = module.get<ActivityRecorderService>(ActivityRecorderService);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should persist a sanitised entry with request metadata', async () => {
    repository.create.mockImplementation(async (data) => ({
      ...data,
      id: 'entry-1',
      createdAt: new Date(),
    }));

    await service.record(
      'user-1',
      'doc-1',
      ActivityAction.UPDATE,
      { fields: ['title'], token: 'abc' },
      { ipAddress: '10.0.0.1', userAgent: 'curl/8.0' },
    );

    expect(repository.create).toHaveBeenCalledWith({
      actorId: 'user-1',
      documentId: 'doc-1',
      action: ActivityAction.UPDATE,
      details: { fields: ['title'], token: '[REDACTED]' },
      ipAddress: '10.0.0.1',
      userAgent: 'curl/8.0',
    });
    expect(service.failedWrites).toBe(0);
  });

  it('should store null metadata without a context', async () => {
    await service.record(null, null, ActivityAction.REGISTER);

    expect(repository.create).toHaveBeenCalledWith({
      actorId: null,
      documentId: null,
      action: ActivityAction.REGISTER,
      details: {},
      ipAddress: null,
      userAgent: null,
    });
  });

  it('should never reject when the write fails', async () => {
    const errorLog = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
    repository.create.mockRejectedValue(new Error('connection lost'));

    await expect(
      service.record('user-1', 'doc-1', ActivityAction.DELETE),
    ).resolves.toBeUndefined();
    await service.record('user-1', 'doc-1', ActivityAction.DELETE);

    expect(service.failedWrites).toBe(2);
    expect(errorLog).toHaveBeenCalledTimes(2);
    expect(errorLog.mock.calls[1][0]).toContain(
      'Failed to persist activity entry (2 failed so far)',
    );
  });
});
