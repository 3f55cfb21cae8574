// src/controllers/message.controller.ts
import { Request, Response } from 'express';
import { Services } from '../services';
import { isAuthenticatedRequest } from '../types/request.types';
import { respondWithError } from '../utils/errors';

const unauthorized = (res: Response): Response =>
  res.status(401).json({ success: false, message: 'Not authorized' });

export const createMessageController = ({ messages, threads, unread }: Services) => ({
  /**
   * @desc    Send a message, optionally as a reply
   * @route   POST /api/messages
   * @access  Private
   */
  sendMessage: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const { receiverId, content, parentMessageId } = req.body;
      const message = await messages.send(req.user.id, { receiverId, content, parentMessageId });

      return res.status(201).json({ success: true, message });
    } catch (error) {
      return respondWithError(res, error, 'Send message error', 'Failed to send message');
    }
  },

  /**
   * @route   GET /api/messages/:id
   * @access  Private (sender or receiver)
   */
  getMessage: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const message = await messages.get(req.user.id, req.params.id);
      return res.json({ success: true, message });
    } catch (error) {
      return respondWithError(res, error, 'Get message error', 'Failed to fetch message');
    }
  },

  /**
   * @desc    Edit a message; the previous content goes to its history
   * @route   PUT /api/messages/:id
   * @access  Private (sender)
   */
  editMessage: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const message = await messages.edit(req.params.id, req.body.content, req.user.id);
      return res.json({ success: true, message });
    } catch (error) {
      return respondWithError(res, error, 'Edit message error', 'Failed to edit message');
    }
  },

  /**
   * @desc    Delete a message with its replies
   * @route   DELETE /api/messages/:id
   * @access  Private (sender)
   */
  deleteMessage: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const deletedCount = await messages.remove(req.user.id, req.params.id);
      return res.json({ success: true, message: 'Message deleted successfully', deletedCount });
    } catch (error) {
      return respondWithError(res, error, 'Delete message error', 'Failed to delete message');
    }
  },

  /**
   * @route   GET /api/messages/:id/history
   * @access  Private (sender or receiver)
   */
  getMessageHistory: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const history = await messages.history(req.user.id, req.params.id);
      return res.json({ success: true, history });
    } catch (error) {
      return respondWithError(res, error, 'Get message history error', 'Failed to fetch message history');
    }
  },

  /**
   * @desc    The whole reply thread the message belongs to
   * @route   GET /api/messages/:id/thread
   * @access  Private (sender or receiver)
   */
  getThread: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const thread = await threads.getThread(req.user.id, req.params.id);
      return res.json({ success: true, thread });
    } catch (error) {
      return respondWithError(res, error, 'Get thread error', 'Failed to fetch thread');
    }
  },

  /**
   * @route   GET /api/messages/unread
   * @access  Private
   */
  getUnreadMessages: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const unreadMessages = await unread.unreadFor(req.user.id);
      return res.json({ success: true, messages: unreadMessages, count: unreadMessages.length });
    } catch (error) {
      return respondWithError(res, error, 'Get unread messages error', 'Failed to fetch unread messages');
    }
  },

  /**
   * @route   GET /api/messages/unread/count
   * @access  Private
   */
  getUnreadCount: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const count = await unread.unreadCount(req.user.id);
      return res.json({ success: true, count });
    } catch (error) {
      return respondWithError(res, error, 'Get unread count error', 'Failed to count unread messages');
    }
  },

  /**
   * @desc    Mark received messages read, all of them when no ids are sent
   * @route   PUT /api/messages/read
   * @access  Private
   */
  markMessagesRead: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const ids: string[] | undefined = Array.isArray(req.body.ids) ? req.body.ids : undefined;
      const updated = await unread.markRead(req.user.id, ids);
      return res.json({ success: true, updated });
    } catch (error) {
      return respondWithError(res, error, 'Mark read error', 'Failed to mark messages as read');
    }
  }
});

export type MessageController = ReturnType<typeof createMessageController>;
