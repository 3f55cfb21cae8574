// src/utils/messagePermissions.ts
import { MessageRecord } from '../types/message.types';
import { PermissionDeniedError } from './errors';

export type MessageAction = 'view' | 'reply' | 'edit' | 'delete';

export const isParticipant = (message: MessageRecord, userId: string): boolean =>
  message.senderId === userId || message.receiverId === userId;

/**
 * Sender and receiver may view and reply; only the sender may edit or delete.
 */
export const canPerform = (message: MessageRecord, userId: string, action: MessageAction): boolean => {
  switch (action) {
    case 'view':
    case 'reply':
      return isParticipant(message, userId);
    case 'edit':
    case 'delete':
      return message.senderId === userId;
  }
};

const ACTION_PHRASES: Record<MessageAction, string> = {
  view: 'view',
  reply: 'reply to',
  edit: 'edit',
  delete: 'delete'
};

export const assertCanPerform = (message: MessageRecord, userId: string, action: MessageAction): void => {
  if (!canPerform(message, userId, action)) {
    throw new PermissionDeniedError(`You are not allowed to ${ACTION_PHRASES[action]} this message`);
  }
};
