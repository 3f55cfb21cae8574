// src/repositories/memory/notification.repository.ts
import { NewNotificationInput, NotificationQuery, NotificationRecord } from '../../types/notifications.types';
import { NotificationRepository } from '../repository.types';
import { MemoryTables, newId } from './memory.tables';

const newestFirst = (a: NotificationRecord, b: NotificationRecord): number =>
  b.createdAt.getTime() - a.createdAt.getTime() || (a.id < b.id ? 1 : a.id > b.id ? -1 : 0);

export class MemoryNotificationRepository implements NotificationRepository {
  constructor(private readonly tables: MemoryTables) {}

  private forUser(userId: string, query: NotificationQuery = {}): NotificationRecord[] {
    return Array.from(this.tables.notifications.values()).filter(
      notification => notification.userId === userId && (!query.unreadOnly || !notification.isRead)
    );
  }

  async create(input: NewNotificationInput): Promise<NotificationRecord> {
    const notification: NotificationRecord = {
      id: newId(),
      userId: input.userId,
      messageId: input.messageId,
      type: input.type,
      title: input.title,
      content: input.content,
      isRead: input.isRead ?? false,
      createdAt: input.createdAt ?? new Date()
    };
    this.tables.notifications.set(notification.id, notification);
    return { ...notification };
  }

  async listForUser(userId: string, query?: NotificationQuery): Promise<NotificationRecord[]> {
    return this.forUser(userId, query)
      .sort(newestFirst)
      .map(notification => ({ ...notification }));
  }

  async countForUser(userId: string, query?: NotificationQuery): Promise<number> {
    return this.forUser(userId, query).length;
  }

  async markRead(userId: string, id: string): Promise<boolean> {
    const notification = this.tables.notifications.get(id);
    if (!notification || notification.userId !== userId) return false;

    this.tables.notifications.set(id, { ...notification, isRead: true });
    return true;
  }

  async markAllRead(userId: string): Promise<number> {
    const unread = this.forUser(userId, { unreadOnly: true });
    unread.forEach(notification => {
      this.tables.notifications.set(notification.id, { ...notification, isRead: true });
    });
    return unread.length;
  }

  async delete(userId: string, id: string): Promise<boolean> {
    const notification = this.tables.notifications.get(id);
    if (!notification || notification.userId !== userId) return false;

    return this.tables.notifications.delete(id);
  }

  async clearRead(userId: string): Promise<number> {
    const read = this.forUser(userId).filter(notification => notification.isRead);
    read.forEach(notification => this.tables.notifications.delete(notification.id));
    return read.length;
  }

  async deleteForUser(userId: string): Promise<number> {
    const owned = this.forUser(userId);
    owned.forEach(notification => this.tables.notifications.delete(notification.id));
    return owned.length;
  }
}
