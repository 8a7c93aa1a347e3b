import { Injectable, Logger } from '@nestjs/common';
import {
  ActivityLogRepository,
  NewActivityLogEntry,
} from './domain/repositories/activity-log.repository.port';
import { ActivityAction } from './domain/entities/activity-action.enum';
import {
  sanitizeDetails,
  sanitizeUserAgent,
} from './utils/details-sanitizer.util';
import { NullableType } from '../utils/types/nullable.type';

export interface ActivityContext {
  ipAddress?: NullableType<string>;
  userAgent?: NullableType<string>;
}

/**
 * Activity Recorder
 *
 * Appends one ActivityLogEntry per mutating action and mirrors it as a
 * structured JSON log line. Called after the action's transaction has
 * committed; a failed write is logged with the full entry and counted in
 * `failedWrites`, and never fails the caller's operation.
 */
@Injectable()
export class ActivityRecorderService {
  private readonly logger = new Logger(ActivityRecorderService.name);

  private failedWriteCount = 0;

  constructor(private readonly activityLogRepository: ActivityLogRepository) {}

  get failedWrites(): number {
    return this.failedWriteCount;
  }

  async record(
    actorId: NullableType<string>,
    documentId: NullableType<string>,
    action: ActivityAction,
    details: Record<string, unknown> = {},
    context?: ActivityContext,
  ): Promise<void> {
    const entry: NewActivityLogEntry = {
      actorId,
      documentId,
      action,
      details: sanitizeDetails(details),
      ipAddress: context?.ipAddress ?? null,
      userAgent: context?.userAgent
        ? sanitizeUserAgent(context.userAgent)
        : null,
    };

    this.logger.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        component: 'activity',
        ...entry,
      }),
    );

    try {
      await this.activityLogRepository.create(entry);
    } catch (error) {
      this.failedWriteCount += 1;
      this.logger.error(
        `Failed to persist activity entry (${this.failedWriteCount} failed so far): ${JSON.stringify(entry)}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
