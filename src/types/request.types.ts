// src/types/request.types.ts
import { Request } from 'express';
import { PublicUser } from './user.types';

declare global {
  namespace Express {
    interface Request {
      user?: PublicUser;
    }
  }
}

/**
 * For handlers mounted behind the auth middleware, where user is guaranteed
 */
export interface AuthenticatedRequest extends Request {
  user: PublicUser;
}

export function isAuthenticatedRequest(req: Request): req is AuthenticatedRequest {
  return req.user !== undefined;
}
