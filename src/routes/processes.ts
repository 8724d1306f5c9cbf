// src/routes/processes.ts

import { Router, Request, Response, NextFunction } from 'express';
import { ConversationGateway } from '../services/conversation/ConversationGateway';
import { LongRunningProcess } from '../services/process/process.types';

function toResponse(entry: LongRunningProcess) {
  return {
    process_id: entry.processId,
    status: entry.status,
    message: entry.message,
    thread_id: entry.threadId ?? null,
    created_at: entry.createdAt,
    updated_at: entry.updatedAt,
  };
}

export function processesRouter(gateway: ConversationGateway): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(gateway.listProcesses().map(toResponse));
  });

  router.get('/:processId', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(toResponse(gateway.getProcess(req.params.processId)));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
