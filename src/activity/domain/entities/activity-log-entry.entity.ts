import { NullableType } from '../../../utils/types/nullable.type';
import { ActivityAction } from './activity-action.enum';

/**
 * Append-only record of a mutating action. Never updated after insert.
 */
export interface ActivityLogEntry {
  id: string;
  actorId: NullableType<string>;
  documentId: NullableType<string>;
  action: ActivityAction;
  details: Record<string, unknown>;
  ipAddress: NullableType<string>;
  userAgent: NullableType<string>;
  createdAt: Date;
}
