import { IBacklogSource } from '../../core/interfaces/IBacklogSource';
import { IModerationStore, PendingMessage } from '../../core/interfaces/IModerationStore';

/**
 * Backlog kept in the store's pending_messages table, with a named checkpoint.
 * Rows at or below a saved checkpoint are pruned.
 */
export class DatabaseBacklogSource implements IBacklogSource {
  private store: IModerationStore;
  private checkpointName: string;

  constructor(store: IModerationStore, checkpointName: string = 'batch_sweep') {
    this.store = store;
    this.checkpointName = checkpointName;
  }

  fetchPending(afterCursor: number, limit: number): Promise<PendingMessage[]> {
    return this.store.fetchPendingMessages(afterCursor, limit);
  }

  loadCheckpoint(): Promise<number> {
    return this.store.getSweepCheckpoint(this.checkpointName);
  }

  async saveCheckpoint(cursor: number): Promise<void> {
    await this.store.setSweepCheckpoint(this.checkpointName, cursor);
    await this.store.prunePendingMessages(cursor);
  }
}
