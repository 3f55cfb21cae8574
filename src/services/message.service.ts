// src/services/message.service.ts
import { DataStore } from '../repositories/repository.types';
import { MessageDraft, MessageHistoryRecord, MessageRecord, SendMessageInput } from '../types/message.types';
import { NotFoundError, ValidationError } from '../utils/errors';
import { assertCanPerform } from '../utils/messagePermissions';
import { HookContext, LifecycleDispatcher } from './lifecycle/hooks';

export type Clock = () => Date;

/**
 * Every message write, with its lifecycle hooks run inside the write's transaction.
 */
export class MessageService {
  constructor(
    private readonly store: DataStore,
    private readonly lifecycle: LifecycleDispatcher,
    private readonly clock: Clock = () => new Date()
  ) {}

  async send(senderId: string, input: SendMessageInput): Promise<MessageRecord> {
    const receiverId = input.receiverId?.trim();
    const content = input.content?.trim() ?? '';

    if (!receiverId) {
      throw new ValidationError('Receiver is required', 'receiverId');
    }
    if (!content) {
      throw new ValidationError('Message content cannot be empty', 'content');
    }

    return this.store.transaction(async store => {
      const receiver = await store.users.findById(receiverId);
      if (!receiver) {
        throw new NotFoundError('User', receiverId);
      }

      let parentMessageId: string | null = null;
      if (input.parentMessageId) {
        const parent = await store.messages.findById(input.parentMessageId);
        if (!parent) {
          throw new NotFoundError('Message', input.parentMessageId);
        }
        assertCanPerform(parent, senderId, 'reply');
        parentMessageId = parent.id;
      }

      const now = this.clock();
      const context: HookContext = { store, now };
      const draft: MessageDraft = {
        senderId,
        receiverId: receiver.id,
        parentMessageId,
        content,
        timestamp: now,
        isRead: false,
        edited: false,
        editedAt: null
      };

      await this.lifecycle.beforeMessageSave(draft, context);
      const created = await store.messages.create({
        senderId: draft.senderId,
        receiverId: draft.receiverId,
        parentMessageId: draft.parentMessageId,
        content: draft.content,
        timestamp: draft.timestamp,
        isRead: draft.isRead
      });
      return this.lifecycle.afterMessageSave(created, true, context);
    });
  }

  /**
   * Rewrites the content. With an actor, only the sender may edit and the
   * actor is recorded as editor; without one the sender is recorded.
   */
  async edit(messageId: string, content: string, actorId?: string): Promise<MessageRecord> {
    const nextContent = content.trim();
    if (!nextContent) {
      throw new ValidationError('Message content cannot be empty', 'content');
    }

    return this.store.transaction(async store => {
      const current = await store.messages.findById(messageId);
      if (!current) {
        throw new NotFoundError('Message', messageId);
      }
      if (actorId !== undefined) {
        assertCanPerform(current, actorId, 'edit');
      }

      const context: HookContext = { store, now: this.clock(), editorId: actorId };
      const draft: MessageDraft = { ...current, content: nextContent };

      await this.lifecycle.beforeMessageSave(draft, context);
      const updated = await store.messages.update(messageId, {
        content: draft.content,
        edited: draft.edited,
        editedAt: draft.editedAt
      });
      if (!updated) {
        throw new NotFoundError('Message', messageId);
      }
      return this.lifecycle.afterMessageSave(updated, false, context);
    });
  }

  async get(actorId: string, messageId: string): Promise<MessageRecord> {
    const message = await this.store.messages.findById(messageId);
    if (!message) {
      throw new NotFoundError('Message', messageId);
    }
    assertCanPerform(message, actorId, 'view');
    return message;
  }

  async history(actorId: string, messageId: string): Promise<MessageHistoryRecord[]> {
    await this.get(actorId, messageId);
    return this.store.history.listForMessage(messageId);
  }

  /**
   * Deletes the message together with its replies, history and notifications.
   */
  async remove(actorId: string, messageId: string): Promise<number> {
    return this.store.transaction(async store => {
      const message = await store.messages.findById(messageId);
      if (!message) {
        throw new NotFoundError('Message', messageId);
      }
      assertCanPerform(message, actorId, 'delete');
      return store.messages.delete(messageId);
    });
  }
}
