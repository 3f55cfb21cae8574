// src/middlewares/requestLogger.middleware.ts
import { NextFunction, Request, Response } from 'express';
import '../types/request.types';

/**
 * One line per request once it finishes: time, acting user, method, path, status.
 * The user is read on finish, after auth has run.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const startedAt = new Date();

  res.on('finish', () => {
    const user = req.user?.username ?? 'Anonymous';
    console.log(
      `${startedAt.toISOString()} - User: ${user} - ${req.method} ${req.originalUrl} ${res.statusCode} (${Date.now() - startedAt.getTime()}ms)`
    );
  });

  next();
};

export default requestLogger;
