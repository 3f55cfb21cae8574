// src/middlewares/auth.middleware.ts
import { RequestHandler } from 'express';
import { UserService } from '../services/user.service';
import '../types/request.types';
import { AuthenticationError, NotFoundError } from '../utils/errors';

/**
 * Resolves the Bearer (or x-auth-token) JWT to the acting user on req.user
 */
export const createAuthMiddleware = (users: UserService): RequestHandler => async (req, res, next) => {
  const authHeader = req.header('authorization');
  let token = req.header('x-auth-token');

  if (!token && authHeader) {
    token = authHeader.startsWith('Bearer ') ? authHeader.slice(7).trim() : authHeader.trim();
  }

  if (!token) {
    res.status(401).json({ success: false, message: 'No token, authorization denied' });
    return;
  }

  try {
    const payload = users.verifyToken(token);
    const user = await users.getById(payload.id);

    if (!user.isActive) {
      res.status(403).json({ success: false, message: 'Account is deactivated' });
      return;
    }

    req.user = user;
    next();
  } catch (error) {
    if (error instanceof AuthenticationError) {
      res.status(401).json({ success: false, message: error.message });
      return;
    }
    if (error instanceof NotFoundError) {
      res.status(401).json({ success: false, message: 'User not found' });
      return;
    }
    next(error);
  }
};

export default createAuthMiddleware;
