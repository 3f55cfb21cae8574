// src/services/lifecycle/notificationDispatcher.ts
import { MessageRecord } from '../../types/message.types';
import { NotificationType } from '../../types/notifications.types';
import { HookContext, MessageHook } from './hooks';

export const PREVIEW_LENGTH = 50;

/**
 * First PREVIEW_LENGTH characters, counted in code points so emoji are never split.
 */
export const buildMessagePreview = (content: string): string => {
  const chars = Array.from(content);
  return chars.length > PREVIEW_LENGTH ? `${chars.slice(0, PREVIEW_LENGTH).join('')}...` : content;
};

/**
 * One notification for the receiver of every newly created message.
 */
export class NotificationDispatcher implements MessageHook {
  readonly name = 'notification-dispatcher';

  async afterSave(message: MessageRecord, created: boolean, { store }: HookContext): Promise<void> {
    if (!created) return;

    const [sender] = await store.users.findSummaries([message.senderId]);
    const senderName = sender ? sender.username : 'Someone';

    await store.notifications.create({
      userId: message.receiverId,
      messageId: message.id,
      type: NotificationType.MESSAGE,
      title: `New message from ${senderName}`,
      content: `You have received a new message: '${buildMessagePreview(message.content)}'`
    });
  }
}

/**
 * New messages always start unread.
 */
export class UnreadOnCreate implements MessageHook {
  readonly name = 'unread-on-create';

  async afterSave(message: MessageRecord, created: boolean, { store }: HookContext): Promise<MessageRecord | void> {
    if (!created || !message.isRead) return;

    const updated = await store.messages.update(message.id, { isRead: false });
    return updated ?? { ...message, isRead: false };
  }
}
