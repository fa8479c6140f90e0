import type { Request, Response, Router } from 'express';
import express from 'express';
import type { JournalSessionRegistry } from '../../core/journal/JournalSessionRegistry.js';
import type { JournalService } from '../../core/journal/JournalService.js';
import { field, sendResult } from './results.js';

type Handler = (service: JournalService, req: Request, res: Response) => void;

/**
 * Journal routes for one session, mounted under
 * `/api/sessions/:sessionId/journal`.
 */
export function createJournalRouter(registry: JournalSessionRegistry): Router {
  const router = express.Router({ mergeParams: true });

  const withSession =
    (handler: Handler) =>
    (req: Request, res: Response): void => {
      const { sessionId } = req.params;
      const session = registry.get(sessionId);
      if (!session) {
        res.status(404).json({
          status: 'error',
          errorKind: 'NotFound',
          message: `Session ${sessionId} not found`,
        });
        return;
      }
      handler(session.service, req, res);
    };

  router.get(
    '/',
    withSession((service, _req, res) => {
      res.status(200).json(service.listEntries());
    })
  );

  router.delete(
    '/',
    withSession((service, _req, res) => sendResult(res, service.clear()))
  );

  // Body is a full article, `{ id }`, or `{ author, title, publishedAt }`.
  router.post(
    '/articles',
    withSession((service, req, res) => {
      const body: unknown = req.body;
      if (field(body, 'author') !== undefined && field(body, 'title') !== undefined) {
        const hasSnapshot = field(body, 'id') !== undefined;
        sendResult(res, hasSnapshot ? service.addArticle(body) : service.addArticleByKey(body));
        return;
      }
      sendResult(res, service.addArticleById(field(body, 'id')));
    })
  );

  router.delete(
    '/articles',
    withSession((service, req, res) => sendResult(res, service.removeByKey(req.body)))
  );

  router.delete(
    '/articles/number/:articleNumber',
    withSession((service, req, res) =>
      sendResult(res, service.removeByArticleNumber(req.params.articleNumber))
    )
  );

  router.delete(
    '/articles/id/:articleId',
    withSession((service, req, res) => sendResult(res, service.removeById(req.params.articleId)))
  );

  router.post(
    '/swap',
    withSession((service, req, res) =>
      sendResult(res, service.swap(field(req.body, 'first'), field(req.body, 'second')))
    )
  );

  router.post(
    '/move',
    withSession((service, req, res) =>
      sendResult(res, service.moveToPosition(field(req.body, 'from'), field(req.body, 'to')))
    )
  );

  router.post(
    '/move-to-front',
    withSession((service, req, res) =>
      sendResult(res, service.moveToFront(field(req.body, 'articleNumber')))
    )
  );

  router.post(
    '/move-to-end',
    withSession((service, req, res) =>
      sendResult(res, service.moveToEnd(field(req.body, 'articleNumber')))
    )
  );

  router.post(
    '/go-to',
    withSession((service, req, res) =>
      sendResult(res, service.goToArticleNumber(field(req.body, 'articleNumber')))
    )
  );

  router.get(
    '/current',
    withSession((service, _req, res) => sendResult(res, service.currentArticle()))
  );

  router.post(
    '/read/current',
    withSession((service, _req, res) => sendResult(res, service.readCurrent()))
  );

  router.post(
    '/read/all',
    withSession((service, _req, res) => sendResult(res, service.readEntireJournal()))
  );

  router.post(
    '/read/rest',
    withSession((service, _req, res) => sendResult(res, service.readRestOfJournal()))
  );

  router.post(
    '/rewind',
    withSession((service, _req, res) => sendResult(res, service.rewind()))
  );

  router.get(
    '/stats',
    withSession((service, _req, res) => sendResult(res, service.stats()))
  );

  return router;
}
