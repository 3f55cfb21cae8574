// src/repositories/mongo/notification.repository.ts
import Notification, { toNotificationRecord } from '../../models/Notification';
import { NewNotificationInput, NotificationQuery, NotificationRecord } from '../../types/notifications.types';
import { NotFoundError } from '../../utils/errors';
import { NotificationRepository } from '../repository.types';
import { Session, toObjectId } from './mongo.utils';

export class MongoNotificationRepository implements NotificationRepository {
  constructor(private readonly session: Session = null) {}

  async create(input: NewNotificationInput): Promise<NotificationRecord> {
    const user = toObjectId(input.userId);
    if (!user) throw new NotFoundError('User', input.userId);

    const notification = new Notification({
      user,
      message: input.messageId ? toObjectId(input.messageId) : null,
      type: input.type,
      title: input.title,
      content: input.content,
      read: input.isRead ?? false,
      createdAt: input.createdAt ?? new Date()
    });

    await notification.save({ session: this.session });
    return toNotificationRecord(notification);
  }

  async listForUser(userId: string, query: NotificationQuery = {}): Promise<NotificationRecord[]> {
    const user = toObjectId(userId);
    if (!user) return [];

    const notifications = await Notification.find(query.unreadOnly ? { user, read: false } : { user })
      .sort({ createdAt: -1, _id: -1 })
      .session(this.session);
    return notifications.map(toNotificationRecord);
  }

  async countForUser(userId: string, query: NotificationQuery = {}): Promise<number> {
    const user = toObjectId(userId);
    if (!user) return 0;

    return Notification.countDocuments(query.unreadOnly ? { user, read: false } : { user })
      .session(this.session);
  }

  async markRead(userId: string, id: string): Promise<boolean> {
    const user = toObjectId(userId);
    const notificationId = toObjectId(id);
    if (!user || !notificationId) return false;

    const result = await Notification.updateOne({ _id: notificationId, user }, { $set: { read: true } })
      .session(this.session);
    return result.matchedCount > 0;
  }

  async markAllRead(userId: string): Promise<number> {
    const user = toObjectId(userId);
    if (!user) return 0;

    const result = await Notification.updateMany({ user, read: false }, { $set: { read: true } })
      .session(this.session);
    return result.modifiedCount;
  }

  async delete(userId: string, id: string): Promise<boolean> {
    const user = toObjectId(userId);
    const notificationId = toObjectId(id);
    if (!user || !notificationId) return false;

    const result = await Notification.deleteOne({ _id: notificationId, user }).session(this.session);
    return result.deletedCount > 0;
  }

  async clearRead(userId: string): Promise<number> {
    const user = toObjectId(userId);
    if (!user) return 0;

    const result = await Notification.deleteMany({ user, read: true }).session(this.session);
    return result.deletedCount;
  }

  async deleteForUser(userId: string): Promise<number> {
    const user = toObjectId(userId);
    if (!user) return 0;

    const result = await Notification.deleteMany({ user }).session(this.session);
    return result.deletedCount;
  }
}
