import { PendingMessage } from './IModerationStore';

/**
 * Messages that arrived while live moderation was unavailable, ordered by cursor.
 */
export interface IBacklogSource {
  fetchPending(afterCursor: number, limit: number): Promise<PendingMessage[]>;
  loadCheckpoint(): Promise<number>;
  saveCheckpoint(cursor: number): Promise<void>;
}
