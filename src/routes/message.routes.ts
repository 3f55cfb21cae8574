// src/routes/message.routes.ts
import express, { Router } from 'express';
import { createMessageController } from '../controllers/message.controller';
import { createAuthMiddleware } from '../middlewares/auth.middleware';
import {
  validateMarkRead,
  validateMessageCreation,
  validateMessageEdit,
  validateObjectId
} from '../middlewares/validation.middleware';
import { Services } from '../services';

export const createMessageRouter = (services: Services): Router => {
  const router = express.Router();
  const controller = createMessageController(services);

  router.use(createAuthMiddleware(services.users));

  router.post('/', validateMessageCreation, controller.sendMessage);

  // Static paths before /:id
  router.get('/unread', controller.getUnreadMessages);
  router.get('/unread/count', controller.getUnreadCount);
  router.put('/read', validateMarkRead, controller.markMessagesRead);

  router.get('/:id', validateObjectId('id'), controller.getMessage);
  router.put('/:id', validateObjectId('id'), validateMessageEdit, controller.editMessage);
  router.delete('/:id', validateObjectId('id'), controller.deleteMessage);
  router.get('/:id/history', validateObjectId('id'), controller.getMessageHistory);
  router.get('/:id/thread', validateObjectId('id'), controller.getThread);

  return router;
};

export default createMessageRouter;
