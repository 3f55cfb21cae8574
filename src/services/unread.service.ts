// src/services/unread.service.ts
import { DataStore } from '../repositories/repository.types';
import { UnreadMessage } from '../types/message.types';

export class UnreadService {
  constructor(private readonly store: DataStore) {}

  /**
   * Unread messages received by the user, newest first, with their sender attached.
   */
  async unreadFor(userId: string): Promise<UnreadMessage[]> {
    const messages = await this.store.messages.findUnreadFor(userId);
    const senderIds = Array.from(new Set(messages.map(message => message.senderId)));
    const senders = new Map(
      (await this.store.users.findSummaries(senderIds)).map(sender => [sender.id, sender])
    );

    return messages.map(message => ({
      ...message,
      sender: senders.get(message.senderId) ?? null
    }));
  }

  async unreadCount(userId: string): Promise<number> {
    return this.store.messages.countUnreadFor(userId);
  }

  /**
   * Marks the user's unread messages read, only those in ids when any are given.
   * Ids that are not unread messages of this receiver are skipped, not rejected.
   */
  async markRead(userId: string, ids?: string[]): Promise<number> {
    return this.store.messages.markReadFor(userId, ids);
  }
}
