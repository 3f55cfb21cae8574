// src/models/Notification.ts
import mongoose, { Schema, Types, HydratedDocument } from 'mongoose';
import { NotificationRecord, NotificationType } from '../types/notifications.types';

export { NotificationType };

/**
 * Interface for the Notification document
 */
export interface INotification {
  user: Types.ObjectId;
  message: Types.ObjectId | null;
  type: NotificationType;
  title: string;
  content: string;
  read: boolean;
  createdAt: Date;
}

export type NotificationDocument = HydratedDocument<INotification>;

/**
 * Schema for the Notification model
 */
const NotificationSchema = new Schema<INotification>({
  user: {
    type: Schema.Types.ObjectId,
    ref: 'User',
    required: true,
    index: true
  },
  message: {
    type: Schema.Types.ObjectId,
    ref: 'Message',
    default: null,
    index: true
  },
  type: {
    type: String,
    enum: Object.values(NotificationType),
    default: NotificationType.MESSAGE
  },
  title: {
    type: String,
    required: true,
    maxlength: 200
  },
  content: {
    type: String,
    required: true
  },
  read: {
    type: Boolean,
    default: false,
    index: true
  },
  createdAt: {
    type: Date,
    default: Date.now
  }
});

/**
 * Compound index for faster queries on unread notifications
 */
NotificationSchema.index({ user: 1, read: 1, createdAt: -1 });

export const toNotificationRecord = (doc: NotificationDocument): NotificationRecord => ({
  id: doc._id.toString(),
  userId: doc.user.toString(),
  messageId: doc.message ? doc.message.toString() : null,
  type: doc.type,
  title: doc.title,
  content: doc.content,
  isRead: doc.read,
  createdAt: doc.createdAt
});

const Notification = mongoose.model<INotification>('Notification', NotificationSchema);

export default Notification;
