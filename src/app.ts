//  src/app.ts
import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { AppConfig } from './config/env';
import { requestLogger } from './middlewares/requestLogger.middleware';
import { createAuthRouter } from './routes/auth.routes';
import { createMessageRouter } from './routes/message.routes';
import { createNotificationRouter } from './routes/notification.routes';
import { createUserRouter } from './routes/user.routes';
import { Services } from './services';
import { respondWithError } from './utils/errors';

export type AppSettings = Pick<AppConfig, 'isProduction' | 'allowedOrigins' | 'logRequests'>;

export const createApp = (services: Services, config: AppSettings): Express => {
  const app = express();

  if (config.isProduction) {
    app.set('trust proxy', 1);
  }

  const corsOptions: cors.CorsOptions = {
    origin: config.allowedOrigins,
    credentials: true
  };
  app.options('*', cors(corsOptions));
  app.use(cors(corsOptions));

  app.use(express.json());

  if (config.logRequests) {
    app.use(requestLogger);
  }

  // --- API ROUTES ---
  app.use('/api/auth', createAuthRouter(services));
  app.use('/api/users', createUserRouter(services));
  app.use('/api/messages', createMessageRouter(services));
  app.use('/api/notifications', createNotificationRouter(services, config));

  // --- 404 and Error Handlers ---
  app.use('*', (req: Request, res: Response) => {
    res.status(404).json({ success: false, message: 'Route not found', path: req.originalUrl });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ success: false, message: 'Malformed JSON body' });
      return;
    }
    respondWithError(res, err, 'Unhandled error', 'Server Error');
  });

  return app;
};

export default createApp;
