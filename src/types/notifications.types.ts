// src/types/notifications.types.ts

export enum NotificationType {
  MESSAGE = 'message',
  SYSTEM = 'system'
}

export interface NotificationRecord {
  id: string;
  userId: string;
  messageId: string | null; // null for system notifications
  type: NotificationType;
  title: string;
  content: string;
  isRead: boolean;
  createdAt: Date;
}

export type NewNotificationInput = Omit<NotificationRecord, 'id' | 'isRead' | 'createdAt'> & {
  isRead?: boolean;
  createdAt?: Date;
};

export interface NotificationQuery {
  unreadOnly?: boolean;
}
