// src/routes/notification.routes.ts
import express, { Router } from 'express';
import { AppConfig } from '../config/env';
import { createNotificationController } from '../controllers/notification.controller';
import { createAuthMiddleware } from '../middlewares/auth.middleware';
import {
  validateNotificationQuery,
  validateObjectId,
  validateSystemNotification
} from '../middlewares/validation.middleware';
import { Services } from '../services';

export const createNotificationRouter = (services: Services, config: Pick<AppConfig, 'isProduction'>): Router => {
  const router = express.Router();
  const controller = createNotificationController(services, config);

  // All routes require authentication
  router.use(createAuthMiddleware(services.users));

  // Get notifications
  router.get('/', validateNotificationQuery, controller.getUserNotifications);
  router.get('/unread-count', controller.getUnreadCount);

  // Update notifications
  router.put('/read-all', controller.markAllNotificationsRead);
  router.put('/:id/read', validateObjectId('id'), controller.markNotificationRead);

  // Delete notifications
  router.delete('/clear-read', controller.clearReadNotifications);
  router.delete('/:id', validateObjectId('id'), controller.deleteNotification);

  // Test route (development only)
  if (!config.isProduction) {
    router.post('/test', validateSystemNotification, controller.sendTestNotification);
  }

  return router;
};

export default createNotificationRouter;
