// src/repositories/mongo/messageHistory.repository.ts
import { MessageHistory, toMessageHistoryRecord } from '../../models/MessageHistory';
import { MessageHistoryRecord, NewMessageHistoryInput } from '../../types/message.types';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { MessageHistoryRepository } from '../repository.types';
import { Session, isDuplicateKeyError, toObjectId } from './mongo.utils';

export class MongoMessageHistoryRepository implements MessageHistoryRepository {
  constructor(private readonly session: Session = null) {}

  async create(input: NewMessageHistoryInput): Promise<MessageHistoryRecord> {
    const message = toObjectId(input.messageId);
    const editedBy = toObjectId(input.editedById);
    if (!message) throw new NotFoundError('Message', input.messageId);
    if (!editedBy) throw new NotFoundError('User', input.editedById);

    const entry = new MessageHistory({
      message,
      oldContent: input.oldContent,
      editedBy,
      editedAt: input.editedAt,
      version: input.version
    });

    try {
      await entry.save({ session: this.session });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError(
          `Version ${input.version} of message ${input.messageId} was recorded concurrently`
        );
      }
      throw error;
    }

    return toMessageHistoryRecord(entry);
  }

  async latestVersion(messageId: string): Promise<number> {
    const message = toObjectId(messageId);
    if (!message) return 0;

    const latest = await MessageHistory.findOne({ message })
      .sort({ version: -1 })
      .select('version')
      .session(this.session);
    return latest ? latest.version : 0;
  }

  async listForMessage(messageId: string): Promise<MessageHistoryRecord[]> {
    const message = toObjectId(messageId);
    if (!message) return [];

    const entries = await MessageHistory.find({ message })
      .sort({ version: 1 })
      .session(this.session);
    return entries.map(toMessageHistoryRecord);
  }

  async countForMessage(messageId: string): Promise<number> {
    const message = toObjectId(messageId);
    if (!message) return 0;

    return MessageHistory.countDocuments({ message }).session(this.session);
  }

  async countByEditor(userId: string): Promise<number> {
    const editedBy = toObjectId(userId);
    if (!editedBy) return 0;

    return MessageHistory.countDocuments({ editedBy }).session(this.session);
  }

  async deleteByEditor(userId: string): Promise<number> {
    const editedBy = toObjectId(userId);
    if (!editedBy) return 0;

    const result = await MessageHistory.deleteMany({ editedBy }).session(this.session);
    return result.deletedCount;
  }
}
