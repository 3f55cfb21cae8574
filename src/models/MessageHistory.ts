// src/models/MessageHistory.ts
import mongoose, { Schema, Types, HydratedDocument } from 'mongoose';
import { MessageHistoryRecord } from '../types/message.types';

export interface IMessageHistory {
  message: Types.ObjectId;
  oldContent: string;
  editedBy: Types.ObjectId;
  editedAt: Date;
  version: number;
}

export type MessageHistoryDocument = HydratedDocument<IMessageHistory>;

const MessageHistorySchema = new Schema<IMessageHistory>({
  message: {
    type: Schema.Types.ObjectId,
    ref: 'Message',
    required: true
  },
  oldContent: {
    type: String,
    required: true
  },
  editedBy: {
    type: Schema.Types.ObjectId,
    ref: 'User',
    required: true,
    index: true
  },
  editedAt: {
    type: Date,
    default: Date.now
  },
  version: {
    type: Number,
    required: true,
    min: 1
  }
});

// One row per (message, version)
MessageHistorySchema.index({ message: 1, version: 1 }, { unique: true });

export const toMessageHistoryRecord = (doc: MessageHistoryDocument): MessageHistoryRecord => ({
  id: doc._id.toString(),
  messageId: doc.message.toString(),
  oldContent: doc.oldContent,
  editedById: doc.editedBy.toString(),
  editedAt: doc.editedAt,
  version: doc.version
});

export const MessageHistory = mongoose.model<IMessageHistory>('MessageHistory', MessageHistorySchema);
