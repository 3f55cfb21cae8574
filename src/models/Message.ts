// src/models/Message.ts
import mongoose, { Schema, Types, HydratedDocument } from 'mongoose';
import { MessageRecord } from '../types/message.types';

export interface IMessage {
  sender: Types.ObjectId;
  receiver: Types.ObjectId;
  parentMessage: Types.ObjectId | null; // reply threading
  content: string;
  timestamp: Date;
  isRead: boolean;
  edited: boolean;
  editedAt: Date | null;
}

export type MessageDocument = HydratedDocument<IMessage>;

const MessageSchema = new Schema<IMessage>({
  sender: {
    type: Schema.Types.ObjectId,
    ref: 'User',
    required: true,
    index: true
  },
  receiver: {
    type: Schema.Types.ObjectId,
    ref: 'User',
    required: true
  },
  parentMessage: {
    type: Schema.Types.ObjectId,
    ref: 'Message',
    default: null
  },
  content: {
    type: String,
    required: true,
    maxlength: 4000
  },
  timestamp: {
    type: Date,
    default: Date.now,
    immutable: true
  },
  isRead: {
    type: Boolean,
    default: false
  },
  edited: {
    type: Boolean,
    default: false
  },
  editedAt: {
    type: Date,
    default: null
  }
});

// Indexes for the unread inbox and for walking reply threads in order
MessageSchema.index({ receiver: 1, isRead: 1, timestamp: -1 });
MessageSchema.index({ parentMessage: 1, timestamp: 1, _id: 1 });

export const toMessageRecord = (doc: MessageDocument): MessageRecord => ({
  id: doc._id.toString(),
  senderId: doc.sender.toString(),
  receiverId: doc.receiver.toString(),
  parentMessageId: doc.parentMessage ? doc.parentMessage.toString() : null,
  content: doc.content,
  timestamp: doc.timestamp,
  isRead: doc.isRead,
  edited: doc.edited,
  editedAt: doc.editedAt ?? null
});

export const Message = mongoose.model<IMessage>('Message', MessageSchema);
