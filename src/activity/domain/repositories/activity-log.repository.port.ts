import { PaginationOptions } from '../../../utils/infinity-pagination';
import { ActivityLogEntry } from '../entities/activity-log-entry.entity';

export type NewActivityLogEntry = Omit<ActivityLogEntry, 'id' | 'createdAt'>;

export abstract class ActivityLogRepository {
  abstract create(data: NewActivityLogEntry): Promise<ActivityLogEntry>;

  /**
   * Entries for one document, newest first
   */
  abstract findByDocumentId(
    documentId: string,
    pagination: PaginationOptions,
  ): Promise<{ data: ActivityLogEntry[]; total: number }>;
}
