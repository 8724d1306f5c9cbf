// src/app.ts

import express, { Express } from 'express';
import cors from 'cors';
import { Logger } from './services/base/types';
import { ConversationGateway } from './services/conversation/ConversationGateway';
import { correlationMiddleware } from './middleware/correlation';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { threadsRouter } from './routes/threads';
import { chatRouter } from './routes/chat';
import { processesRouter } from './routes/processes';

export interface AppDependencies {
  gateway: ConversationGateway;
  logger: Logger;
}

export function createApp({ gateway, logger }: AppDependencies): Express {
  const app = express();

  app.use(correlationMiddleware);
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/threads', threadsRouter(gateway));
  app.use('/chat', chatRouter(gateway));
  app.use('/processes', processesRouter(gateway));

  app.use(notFoundHandler());
  app.use(errorHandler(logger));

  return app;
}
