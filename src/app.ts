import express, { type Express, type Request, type RequestHandler, type Response } from 'express';
import cors from 'cors';
import type { MessagingContext } from './context';
import { errorHandler } from './middleware/error.middleware';
import { createMessageRoutes } from './routes/message.routes';
import { createNotificationRoutes } from './routes/notification.routes';
import { createThreadRoutes } from './routes/thread.routes';
import { createUserRoutes } from './routes/user.routes';

export interface AppOptions {
  /** Must set `req.userId` or fail the request */
  requireAuth: RequestHandler;
  allowedOrigins?: string[];
}

export const createApp = (ctx: MessagingContext, options: AppOptions): Express => {
  const app = express();
  const allowedOrigins = options.allowedOrigins ?? [];

  app.use(cors({
    origin: (origin, callback) => {
      // Requests with no origin (curl, server-to-server)
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }
      console.log('[http] blocked origin:', origin);
      callback(new Error(`Origin ${origin} not allowed by CORS`));
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept'],
    maxAge: 86400,
    optionsSuccessStatus: 204,
  }));

  app.use(express.json());

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/messages', options.requireAuth, createMessageRoutes(ctx));
  app.use('/api/threads', options.requireAuth, createThreadRoutes(ctx));
  app.use('/api/notifications', options.requireAuth, createNotificationRoutes(ctx));
  app.use('/api/users', options.requireAuth, createUserRoutes(ctx));

  app.use(errorHandler);

  return app;
};
