// src/repositories/memory/messageHistory.repository.ts
import { MessageHistoryRecord, NewMessageHistoryInput } from '../../types/message.types';
import { ConflictError } from '../../utils/errors';
import { MessageHistoryRepository } from '../repository.types';
import { MemoryTables, newId } from './memory.tables';

export class MemoryMessageHistoryRepository implements MessageHistoryRepository {
  constructor(private readonly tables: MemoryTables) {}

  private forMessage(messageId: string): MessageHistoryRecord[] {
    return Array.from(this.tables.history.values()).filter(entry => entry.messageId === messageId);
  }

  async create(input: NewMessageHistoryInput): Promise<MessageHistoryRecord> {
    if (this.forMessage(input.messageId).some(entry => entry.version === input.version)) {
      throw new ConflictError(
        `Version ${input.version} of message ${input.messageId} was recorded concurrently`
      );
    }

    const entry: MessageHistoryRecord = { id: newId(), ...input };
    this.tables.history.set(entry.id, entry);
    return { ...entry };
  }

  async latestVersion(messageId: string): Promise<number> {
    return this.forMessage(messageId).reduce((latest, entry) => Math.max(latest, entry.version), 0);
  }

  async listForMessage(messageId: string): Promise<MessageHistoryRecord[]> {
    return this.forMessage(messageId)
      .sort((a, b) => a.version - b.version)
      .map(entry => ({ ...entry }));
  }

  async countForMessage(messageId: string): Promise<number> {
    return this.forMessage(messageId).length;
  }

  async countByEditor(userId: string): Promise<number> {
    return Array.from(this.tables.history.values()).filter(entry => entry.editedById === userId).length;
  }

  async deleteByEditor(userId: string): Promise<number> {
    let deleted = 0;
    this.tables.history.forEach((entry, id) => {
      if (entry.editedById === userId) {
        this.tables.history.delete(id);
        deleted += 1;
      }
    });
    return deleted;
  }
}
