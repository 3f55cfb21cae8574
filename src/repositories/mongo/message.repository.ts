// src/repositories/mongo/message.repository.ts
import { FilterQuery, Types } from 'mongoose';
import { IMessage, Message, toMessageRecord } from '../../models/Message';
import { MessageChanges, MessageRecord, NewMessageInput } from '../../types/message.types';
import { NotFoundError } from '../../utils/errors';
import { MessageRepository } from '../repository.types';
import { Session, deleteMessagesCascade, toObjectId, toObjectIds } from './mongo.utils';

const requireObjectId = (id: string, resource: string): Types.ObjectId => {
  const objectId = toObjectId(id);
  if (!objectId) {
    throw new NotFoundError(resource, id);
  }
  return objectId;
};

export class MongoMessageRepository implements MessageRepository {
  constructor(private readonly session: Session = null) {}

  async create(input: NewMessageInput): Promise<MessageRecord> {
    const message = new Message({
      sender: requireObjectId(input.senderId, 'User'),
      receiver: requireObjectId(input.receiverId, 'User'),
      parentMessage: input.parentMessageId ? requireObjectId(input.parentMessageId, 'Message') : null,
      content: input.content,
      timestamp: input.timestamp ?? new Date(),
      isRead: input.isRead ?? false
    });

    await message.save({ session: this.session });
    return toMessageRecord(message);
  }

  async findById(id: string): Promise<MessageRecord | null> {
    const objectId = toObjectId(id);
    if (!objectId) return null;

    const message = await Message.findById(objectId).session(this.session);
    return message ? toMessageRecord(message) : null;
  }

  async update(id: string, changes: MessageChanges): Promise<MessageRecord | null> {
    const objectId = toObjectId(id);
    if (!objectId) return null;

    const message = await Message.findByIdAndUpdate(objectId, { $set: changes }, { new: true })
      .session(this.session);
    return message ? toMessageRecord(message) : null;
  }

  async findReplies(parentIds: string[]): Promise<MessageRecord[]> {
    const parents = toObjectIds(parentIds);
    if (parents.length === 0) return [];

    const replies = await Message.find({ parentMessage: { $in: parents } })
      .sort({ timestamp: 1, _id: 1 })
      .session(this.session);
    return replies.map(toMessageRecord);
  }

  async findUnreadFor(receiverId: string): Promise<MessageRecord[]> {
    const receiver = toObjectId(receiverId);
    if (!receiver) return [];

    const messages = await Message.find({ receiver, isRead: false })
      .sort({ timestamp: -1, _id: -1 })
      .session(this.session);
    return messages.map(toMessageRecord);
  }

  async countUnreadFor(receiverId: string): Promise<number> {
    const receiver = toObjectId(receiverId);
    if (!receiver) return 0;

    return Message.countDocuments({ receiver, isRead: false }).session(this.session);
  }

  async markReadFor(receiverId: string, ids?: string[]): Promise<number> {
    const receiver = toObjectId(receiverId);
    if (!receiver) return 0;

    const filter: FilterQuery<IMessage> = { receiver, isRead: false };
    if (ids && ids.length > 0) {
      filter._id = { $in: toObjectIds(ids) };
    }

    const result = await Message.updateMany(filter, { $set: { isRead: true } }).session(this.session);
    return result.modifiedCount;
  }

  async countBySender(senderId: string): Promise<number> {
    const sender = toObjectId(senderId);
    if (!sender) return 0;

    return Message.countDocuments({ sender }).session(this.session);
  }

  async countByReceiver(receiverId: string): Promise<number> {
    const receiver = toObjectId(receiverId);
    if (!receiver) return 0;

    return Message.countDocuments({ receiver }).session(this.session);
  }

  async delete(id: string): Promise<number> {
    const objectId = toObjectId(id);
    if (!objectId) return 0;

    const exists = await Message.exists({ _id: objectId }).session(this.session);
    if (!exists) return 0;

    return deleteMessagesCascade([objectId], this.session);
  }

  async deleteByParticipant(userId: string): Promise<number> {
    const participant = toObjectId(userId);
    if (!participant) return 0;

    const messages = await Message.find({ $or: [{ sender: participant }, { receiver: participant }] })
      .select('_id')
      .session(this.session);
    return deleteMessagesCascade(messages.map(message => message._id), this.session);
  }
}
