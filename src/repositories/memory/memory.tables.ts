// src/repositories/memory/memory.tables.ts
import { Types } from 'mongoose';
import { MessageHistoryRecord, MessageRecord } from '../../types/message.types';
import { NotificationRecord } from '../../types/notifications.types';
import { UserRecord } from '../../types/user.types';

export interface MemoryTables {
  users: Map<string, UserRecord>;
  messages: Map<string, MessageRecord>;
  history: Map<string, MessageHistoryRecord>;
  notifications: Map<string, NotificationRecord>;
}

export const createTables = (): MemoryTables => ({
  users: new Map(),
  messages: new Map(),
  history: new Map(),
  notifications: new Map()
});

// Same id shape as the Mongo driver
export const newId = (): string => new Types.ObjectId().toHexString();

const copyTable = <T extends object>(table: Map<string, T>): Map<string, T> =>
  new Map(Array.from(table, ([id, row]): [string, T] => [id, { ...row }]));

export const snapshotTables = (tables: MemoryTables): MemoryTables => ({
  users: copyTable(tables.users),
  messages: copyTable(tables.messages),
  history: copyTable(tables.history),
  notifications: copyTable(tables.notifications)
});

const replaceTable = <T>(target: Map<string, T>, source: Map<string, T>): void => {
  target.clear();
  source.forEach((row, id) => target.set(id, row));
};

export const restoreTables = (tables: MemoryTables, snapshot: MemoryTables): void => {
  replaceTable(tables.users, snapshot.users);
  replaceTable(tables.messages, snapshot.messages);
  replaceTable(tables.history, snapshot.history);
  replaceTable(tables.notifications, snapshot.notifications);
};

/**
 * Timestamp ascending, id as the tie-break.
 */
export const compareChronological = (a: MessageRecord, b: MessageRecord): number =>
  a.timestamp.getTime() - b.timestamp.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

/**
 * Removes the messages, their replies at any depth, and the history and
 * notifications of all of them. Returns the number of messages removed.
 */
export const deleteMessagesCascade = (tables: MemoryTables, ids: string[]): number => {
  const doomed = new Set<string>();
  let frontier = ids.filter(id => tables.messages.has(id));

  while (frontier.length > 0) {
    frontier.forEach(id => doomed.add(id));
    const level = new Set(frontier);
    frontier = Array.from(tables.messages.values())
      .filter(message => message.parentMessageId !== null && level.has(message.parentMessageId) && !doomed.has(message.id))
      .map(message => message.id);
  }

  tables.history.forEach((entry, id) => {
    if (doomed.has(entry.messageId)) tables.history.delete(id);
  });
  tables.notifications.forEach((notification, id) => {
    if (notification.messageId !== null && doomed.has(notification.messageId)) tables.notifications.delete(id);
  });
  doomed.forEach(id => tables.messages.delete(id));

  return doomed.size;
};
