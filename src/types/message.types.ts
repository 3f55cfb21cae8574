// src/types/message.types.ts
import { UserSummary } from './user.types';

export interface MessageRecord {
  id: string;
  senderId: string;
  receiverId: string;
  parentMessageId: string | null;
  content: string;
  timestamp: Date;
  isRead: boolean;
  edited: boolean;
  editedAt: Date | null;
}

/**
 * A message on its way to the store. New messages have no id yet.
 */
export type MessageDraft = Omit<MessageRecord, 'id'> & { id?: string };

export interface NewMessageInput {
  senderId: string;
  receiverId: string;
  content: string;
  parentMessageId?: string | null;
  isRead?: boolean;
  timestamp?: Date;
}

export type MessageChanges = Partial<Pick<MessageRecord, 'content' | 'isRead' | 'edited' | 'editedAt'>>;

export interface SendMessageInput {
  receiverId?: string;
  content?: string;
  parentMessageId?: string | null;
}

export interface MessageHistoryRecord {
  id: string;
  messageId: string;
  oldContent: string;
  editedById: string;
  editedAt: Date;
  version: number;
}

export type NewMessageHistoryInput = Omit<MessageHistoryRecord, 'id'>;

export interface UnreadMessage extends MessageRecord {
  sender: UserSummary | null;
}

export interface ThreadNode {
  message: MessageRecord;
  depth: number;
  replies: ThreadNode[];
}

export interface MessageThread {
  root: MessageRecord;
  replies: ThreadNode[];
}
