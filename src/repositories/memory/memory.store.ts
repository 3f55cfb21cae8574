// src/repositories/memory/memory.store.ts
import { DataStore } from '../repository.types';
import { MemoryMessageHistoryRepository } from './messageHistory.repository';
import { MemoryMessageRepository } from './message.repository';
import { MemoryNotificationRepository } from './notification.repository';
import { MemoryUserRepository } from './user.repository';
import { MemoryTables, createTables, restoreTables, snapshotTables } from './memory.tables';

/**
 * In-process DataStore with the same cascade rules as the Mongo driver.
 * Transactions run one at a time and roll back to a snapshot when work throws.
 */
export class MemoryDataStore implements DataStore {
  readonly users: MemoryUserRepository;
  readonly messages: MemoryMessageRepository;
  readonly history: MemoryMessageHistoryRepository;
  readonly notifications: MemoryNotificationRepository;

  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly tables: MemoryTables = createTables(),
    private readonly inTransaction = false
  ) {
    this.users = new MemoryUserRepository(tables);
    this.messages = new MemoryMessageRepository(tables);
    this.history = new MemoryMessageHistoryRepository(tables);
    this.notifications = new MemoryNotificationRepository(tables);
  }

  async transaction<T>(work: (store: DataStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return work(this);
    }

    const run = async (): Promise<T> => {
      const snapshot = snapshotTables(this.tables);
      try {
        return await work(new MemoryDataStore(this.tables, true));
      } catch (error) {
        restoreTables(this.tables, snapshot);
        throw error;
      }
    };

    const result = this.queue.then(run);
    // the caller gets the rejection through result; the queue only waits for it to settle
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
