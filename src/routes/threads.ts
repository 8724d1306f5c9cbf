// src/routes/threads.ts

import { Router, Request, Response, NextFunction } from 'express';
import { ConversationGateway, ThreadView } from '../services/conversation/ConversationGateway';

function toResponse(view: ThreadView) {
  return { thread_id: view.threadId, messages: view.messages };
}

export function threadsRouter(gateway: ConversationGateway): Router {
  const router = Router();

  router.post('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const view = await gateway.createThread();
      res.status(201).json(toResponse(view));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:threadId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const view = await gateway.getThread(req.params.threadId);
      res.json(toResponse(view));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
