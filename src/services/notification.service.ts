// src/services/notification.service.ts
import { DataStore } from '../repositories/repository.types';
import { NotificationQuery, NotificationRecord, NotificationType } from '../types/notifications.types';
import { NotFoundError, ValidationError } from '../utils/errors';

export class NotificationService {
  constructor(private readonly store: DataStore) {}

  async list(userId: string, query: NotificationQuery = {}): Promise<NotificationRecord[]> {
    return this.store.notifications.listForUser(userId, query);
  }

  async unreadCount(userId: string): Promise<number> {
    return this.store.notifications.countForUser(userId, { unreadOnly: true });
  }

  async markRead(userId: string, notificationId: string): Promise<void> {
    const updated = await this.store.notifications.markRead(userId, notificationId);
    if (!updated) {
      throw new NotFoundError('Notification', notificationId);
    }
  }

  async markAllRead(userId: string): Promise<number> {
    return this.store.notifications.markAllRead(userId);
  }

  async delete(userId: string, notificationId: string): Promise<void> {
    const deleted = await this.store.notifications.delete(userId, notificationId);
    if (!deleted) {
      throw new NotFoundError('Notification', notificationId);
    }
  }

  async clearRead(userId: string): Promise<number> {
    return this.store.notifications.clearRead(userId);
  }

  /**
   * Send system notification (not tied to any message)
   */
  async system(userId: string, title: string, content: string): Promise<NotificationRecord> {
    if (!title.trim() || !content.trim()) {
      throw new ValidationError('System notifications need a title and content');
    }

    const user = await this.store.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User', userId);
    }

    return this.store.notifications.create({
      userId,
      messageId: null,
      type: NotificationType.SYSTEM,
      title: title.trim(),
      content: content.trim()
    });
  }
}
