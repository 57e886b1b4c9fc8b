import dotenv from 'dotenv';

// Load environment variables before anything reads them
dotenv.config();

import { createServer } from 'http';
import { createApp } from './app';
import { loadConfig } from './config';
import { createMessagingContext } from './context';
import { createDatabase } from './db/client';
import { createRequireAuth } from './middleware/auth.middleware';

const config = loadConfig();

const database = createDatabase({
  url: config.databaseUrl,
  schemaPath: config.schemaPath,
  logger: config.logQueries,
});

const ctx = createMessagingContext({ db: database.db });

const app = createApp(ctx, {
  requireAuth: createRequireAuth(ctx.users),
  allowedOrigins: config.allowedOrigins,
});

const httpServer = createServer(app);

httpServer.listen(config.port, () => {
  console.log(`Server running on port ${config.port} (${config.env})`);
  console.log('Allowed origins:', config.allowedOrigins);
});

const shutdown = (signal: string) => {
  console.log(`${signal} received, closing server`);
  httpServer.close(() => {
    database.close();
    process.exit(0);
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export { app, ctx };
