// src/repositories/repository.types.ts
import {
  MessageChanges,
  MessageHistoryRecord,
  MessageRecord,
  NewMessageHistoryInput,
  NewMessageInput
} from '../types/message.types';
import { NewNotificationInput, NotificationQuery, NotificationRecord } from '../types/notifications.types';
import { NewUserInput, UserRecord, UserSummary } from '../types/user.types';

export interface UserRepository {
  create(input: NewUserInput): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  existsWithUsernameOrEmail(username: string, email: string): Promise<boolean>;
  findSummaries(ids: string[]): Promise<UserSummary[]>;
  /**
   * Deletes the user and, by cascade, every message they sent or received,
   * every notification addressed to them and every history row they authored.
   * Resolves false when no such user exists.
   */
  delete(id: string): Promise<boolean>;
}

export interface MessageRepository {
  create(input: NewMessageInput): Promise<MessageRecord>;
  findById(id: string): Promise<MessageRecord | null>;
  update(id: string, changes: MessageChanges): Promise<MessageRecord | null>;
  /**
   * Direct replies of every given parent, ordered by timestamp then id.
   */
  findReplies(parentIds: string[]): Promise<MessageRecord[]>;
  /**
   * Unread messages received by the user, newest first.
   */
  findUnreadFor(receiverId: string): Promise<MessageRecord[]>;
  countUnreadFor(receiverId: string): Promise<number>;
  /**
   * Marks the receiver's unread messages read, restricted to ids when the list is non-empty.
   * Resolves with the number of rows that changed.
   */
  markReadFor(receiverId: string, ids?: string[]): Promise<number>;
  countBySender(senderId: string): Promise<number>;
  countByReceiver(receiverId: string): Promise<number>;
  /**
   * Deletes the message with its replies (transitively), their history and their notifications.
   * Resolves with the number of messages removed.
   */
  delete(id: string): Promise<number>;
  /**
   * Same cascade as delete, for every message the user sent or received.
   */
  deleteByParticipant(userId: string): Promise<number>;
}

export interface MessageHistoryRepository {
  /**
   * Rejects with a ConflictError when (messageId, version) already exists.
   */
  create(input: NewMessageHistoryInput): Promise<MessageHistoryRecord>;
  /**
   * Highest version recorded for the message, 0 when it was never edited.
   */
  latestVersion(messageId: string): Promise<number>;
  listForMessage(messageId: string): Promise<MessageHistoryRecord[]>;
  countForMessage(messageId: string): Promise<number>;
  countByEditor(userId: string): Promise<number>;
  deleteByEditor(userId: string): Promise<number>;
}

export interface NotificationRepository {
  create(input: NewNotificationInput): Promise<NotificationRecord>;
  listForUser(userId: string, query?: NotificationQuery): Promise<NotificationRecord[]>;
  countForUser(userId: string, query?: NotificationQuery): Promise<number>;
  markRead(userId: string, id: string): Promise<boolean>;
  markAllRead(userId: string): Promise<number>;
  delete(userId: string, id: string): Promise<boolean>;
  clearRead(userId: string): Promise<number>;
  deleteForUser(userId: string): Promise<number>;
}

export interface DataStore {
  readonly users: UserRepository;
  readonly messages: MessageRepository;
  readonly history: MessageHistoryRepository;
  readonly notifications: NotificationRepository;
  /**
   * Runs work atomically against a store bound to the transaction.
   * Calls made from inside work join the running transaction.
   */
  transaction<T>(work: (store: DataStore) => Promise<T>): Promise<T>;
}
