// src/repositories/mongo/mongo.store.ts
import mongoose from 'mongoose';
import { DataStore } from '../repository.types';
import { MongoMessageHistoryRepository } from './messageHistory.repository';
import { MongoMessageRepository } from './message.repository';
import { MongoNotificationRepository } from './notification.repository';
import { MongoUserRepository } from './user.repository';
import { ConflictError } from '../../utils/errors';
import { Session, isWriteConflictError } from './mongo.utils';

/**
 * DataStore over the Mongoose models. Transactions need a replica set and
 * run once; a write conflict surfaces as ConflictError.
 */
export class MongoDataStore implements DataStore {
  readonly users: MongoUserRepository;
  readonly messages: MongoMessageRepository;
  readonly history: MongoMessageHistoryRepository;
  readonly notifications: MongoNotificationRepository;

  constructor(private readonly session: Session = null) {
    this.users = new MongoUserRepository(session);
    this.messages = new MongoMessageRepository(session);
    this.history = new MongoMessageHistoryRepository(session);
    this.notifications = new MongoNotificationRepository(session);
  }

  async transaction<T>(work: (store: DataStore) => Promise<T>): Promise<T> {
    if (this.session) {
      return work(this);
    }

    // Single attempt: a write conflict is reported to the caller, not retried
    const session = await mongoose.startSession();
    try {
      session.startTransaction();
      const result = await work(new MongoDataStore(session));
      await session.commitTransaction();
      return result;
    } catch (error) {
      if (session.inTransaction()) {
        await session.abortTransaction();
      }
      if (isWriteConflictError(error)) {
        throw new ConflictError('Another request changed the same data; retry', { cause: error });
      }
      throw error;
    } finally {
      await session.endSession();
    }
  }
}
