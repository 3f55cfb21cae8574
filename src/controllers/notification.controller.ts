// src/controllers/notification.controller.ts
import { Request, Response } from 'express';
import { AppConfig } from '../config/env';
import { Services } from '../services';
import { isAuthenticatedRequest } from '../types/request.types';
import { respondWithError } from '../utils/errors';

const unauthorized = (res: Response): Response =>
  res.status(401).json({ success: false, message: 'Not authorized' });

export const createNotificationController = ({ notifications }: Services, config: Pick<AppConfig, 'isProduction'>) => ({
  /**
   * @desc    Get user's notifications
   * @route   GET /api/notifications
   * @access  Private
   */
  getUserNotifications: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const unreadOnly = req.query.unreadOnly === 'true';
      const [items, unreadCount] = await Promise.all([
        notifications.list(req.user.id, { unreadOnly }),
        notifications.unreadCount(req.user.id)
      ]);

      return res.status(200).json({ success: true, notifications: items, unreadCount });
    } catch (error) {
      return respondWithError(res, error, 'Error getting notifications', 'Server error');
    }
  },

  /**
   * @desc    Get unread notification count
   * @route   GET /api/notifications/unread-count
   * @access  Private
   */
  getUnreadCount: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const count = await notifications.unreadCount(req.user.id);
      return res.status(200).json({ success: true, count });
    } catch (error) {
      return respondWithError(res, error, 'Error getting unread count', 'Server error');
    }
  },

  /**
   * @desc    Mark a notification as read
   * @route   PUT /api/notifications/:id/read
   * @access  Private
   */
  markNotificationRead: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      await notifications.markRead(req.user.id, req.params.id);
      return res.status(200).json({ success: true, message: 'Notification marked as read' });
    } catch (error) {
      return respondWithError(res, error, 'Error marking notification as read', 'Server error');
    }
  },

  /**
   * @desc    Mark all notifications as read
   * @route   PUT /api/notifications/read-all
   * @access  Private
   */
  markAllNotificationsRead: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const count = await notifications.markAllRead(req.user.id);
      return res.status(200).json({ success: true, message: 'All notifications marked as read', count });
    } catch (error) {
      return respondWithError(res, error, 'Error marking all notifications as read', 'Server error');
    }
  },

  /**
   * @desc    Delete a notification
   * @route   DELETE /api/notifications/:id
   * @access  Private
   */
  deleteNotification: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      await notifications.delete(req.user.id, req.params.id);
      return res.status(200).json({ success: true, message: 'Notification deleted' });
    } catch (error) {
      return respondWithError(res, error, 'Error deleting notification', 'Server error');
    }
  },

  /**
   * @desc    Delete all read notifications
   * @route   DELETE /api/notifications/clear-read
   * @access  Private
   */
  clearReadNotifications: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const count = await notifications.clearRead(req.user.id);
      return res.status(200).json({ success: true, message: 'Read notifications cleared', count });
    } catch (error) {
      return respondWithError(res, error, 'Error clearing read notifications', 'Server error');
    }
  },

  /**
   * @desc    Send a system notification to yourself (for development purposes)
   * @route   POST /api/notifications/test
   * @access  Private (non-production only)
   */
  sendTestNotification: async (req: Request, res: Response): Promise<Response> => {
    if (config.isProduction) {
      return res.status(403).json({ success: false, message: 'Not available in production' });
    }
    if (!isAuthenticatedRequest(req)) return unauthorized(res);

    try {
      const { title, content } = req.body;
      const notification = await notifications.system(
        req.user.id,
        title || 'Test notification',
        content || 'This is a test notification'
      );

      return res.status(201).json({ success: true, message: 'Test notification sent', notification });
    } catch (error) {
      return respondWithError(res, error, 'Error sending test notification', 'Server error');
    }
  }
});

export type NotificationController = ReturnType<typeof createNotificationController>;
