// src/routes/chat.ts

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from '../errors';
import { ConversationGateway } from '../services/conversation/ConversationGateway';

const chatRequestSchema = z.object({
  thread_id: z.string().min(1),
  message: z.string().min(1),
});

export function chatRouter(gateway: ConversationGateway): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
      next(new ValidationError(`thread_id and message are required (invalid: ${fields})`));
      return;
    }

    // Abandon the turn if the client goes away before it finishes.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const response = await gateway.chat(parsed.data.thread_id, parsed.data.message, { signal: controller.signal });
      res.json({ response });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
