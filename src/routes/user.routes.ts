// src/routes/user.routes.ts
import express, { Router } from 'express';
import { createUserController } from '../controllers/user.controller';
import { createAuthMiddleware } from '../middlewares/auth.middleware';
import { validateAccountDeletion } from '../middlewares/validation.middleware';
import { Services } from '../services';

export const createUserRouter = (services: Services): Router => {
  const router = express.Router();
  const controller = createUserController(services);

  router.use(createAuthMiddleware(services.users));

  router.get('/me/deletion-stats', controller.getDeletionStats);
  router.delete('/me', validateAccountDeletion, controller.deleteAccount);

  return router;
};

export default createUserRouter;
