// src/repositories/memory/message.repository.ts
import { MessageChanges, MessageRecord, NewMessageInput } from '../../types/message.types';
import { MessageRepository } from '../repository.types';
import { MemoryTables, compareChronological, deleteMessagesCascade, newId } from './memory.tables';

export class MemoryMessageRepository implements MessageRepository {
  constructor(private readonly tables: MemoryTables) {}

  private all(): MessageRecord[] {
    return Array.from(this.tables.messages.values());
  }

  async create(input: NewMessageInput): Promise<MessageRecord> {
    const message: MessageRecord = {
      id: newId(),
      senderId: input.senderId,
      receiverId: input.receiverId,
      parentMessageId: input.parentMessageId ?? null,
      content: input.content,
      timestamp: input.timestamp ?? new Date(),
      isRead: input.isRead ?? false,
      edited: false,
      editedAt: null
    };
    this.tables.messages.set(message.id, message);
    return { ...message };
  }

  async findById(id: string): Promise<MessageRecord | null> {
    const message = this.tables.messages.get(id);
    return message ? { ...message } : null;
  }

  async update(id: string, changes: MessageChanges): Promise<MessageRecord | null> {
    const current = this.tables.messages.get(id);
    if (!current) return null;

    const updated: MessageRecord = { ...current, ...changes };
    this.tables.messages.set(id, updated);
    return { ...updated };
  }

  async findReplies(parentIds: string[]): Promise<MessageRecord[]> {
    const parents = new Set(parentIds);
    return this.all()
      .filter(message => message.parentMessageId !== null && parents.has(message.parentMessageId))
      .sort(compareChronological)
      .map(message => ({ ...message }));
  }

  async findUnreadFor(receiverId: string): Promise<MessageRecord[]> {
    return this.all()
      .filter(message => message.receiverId === receiverId && !message.isRead)
      .sort((a, b) => compareChronological(b, a))
      .map(message => ({ ...message }));
  }

  async countUnreadFor(receiverId: string): Promise<number> {
    return this.all().filter(message => message.receiverId === receiverId && !message.isRead).length;
  }

  async markReadFor(receiverId: string, ids?: string[]): Promise<number> {
    const restrictTo = ids && ids.length > 0 ? new Set(ids) : null;
    let updated = 0;

    this.tables.messages.forEach((message, id) => {
      if (message.receiverId !== receiverId || message.isRead) return;
      if (restrictTo && !restrictTo.has(id)) return;

      this.tables.messages.set(id, { ...message, isRead: true });
      updated += 1;
    });

    return updated;
  }

  async countBySender(senderId: string): Promise<number> {
    return this.all().filter(message => message.senderId === senderId).length;
  }

  async countByReceiver(receiverId: string): Promise<number> {
    return this.all().filter(message => message.receiverId === receiverId).length;
  }

  async delete(id: string): Promise<number> {
    return deleteMessagesCascade(this.tables, [id]);
  }

  async deleteByParticipant(userId: string): Promise<number> {
    const participated = this.all()
      .filter(message => message.senderId === userId || message.receiverId === userId)
      .map(message => message.id);
    return deleteMessagesCascade(this.tables, participated);
  }
}
