// src/routes/auth.routes.ts
import express, { Router } from 'express';
import { createAuthController } from '../controllers/auth.controller';
import { createAuthMiddleware } from '../middlewares/auth.middleware';
import { validateUserLogin, validateUserRegistration } from '../middlewares/validation.middleware';
import { Services } from '../services';

export const createAuthRouter = (services: Services): Router => {
  const router = express.Router();
  const controller = createAuthController(services);

  /**
   * @route   POST api/auth/register
   * @desc    Register a new user
   * @access  Public
   */
  router.post('/register', validateUserRegistration, controller.register);

  /**
   * @route   POST api/auth/login
   * @desc    Authenticate user & get token
   * @access  Public
   */
  router.post('/login', validateUserLogin, controller.login);

  /**
   * @route   GET api/auth/me
   * @desc    Get current user
   * @access  Private
   */
  router.get('/me', createAuthMiddleware(services.users), controller.getMe);

  return router;
};

export default createAuthRouter;
