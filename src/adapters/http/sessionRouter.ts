import type { Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { JournalSessionRegistry } from '../../core/journal/JournalSessionRegistry.js';
import { createJournalRouter } from './journalRouter.js';

const openSessionSchema = z.object({ userId: z.string().trim().min(1) });

/**
 * Session lifecycle: a journal is created on login and torn down on logout.
 */
export function createSessionRouter(registry: JournalSessionRegistry): Router {
  const router = express.Router();

  router.post('/', (req, res) => {
    const parsed = openSessionSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        status: 'error',
        errorKind: 'InvalidArgument',
        message: 'userId is required',
      });
      return;
    }
    const session = registry.open(parsed.data.userId);
    res.status(201).json({
      status: 'success',
      sessionId: session.sessionId,
      userId: session.userId,
      createdAt: session.createdAt.toISOString(),
    });
  });

  router.delete('/:sessionId', (req, res) => {
    if (!registry.close(req.params.sessionId)) {
      res.status(404).json({
        status: 'error',
        errorKind: 'NotFound',
        message: `Session ${req.params.sessionId} not found`,
      });
      return;
    }
    res.status(200).json({ status: 'success' });
  });

  router.use('/:sessionId/journal', createJournalRouter(registry));

  return router;
}
