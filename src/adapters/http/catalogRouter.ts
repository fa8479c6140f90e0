import type { Response, Router } from 'express';
import express from 'express';
import { articleKeySchema, articleRefSchema, formatIssues } from '../../core/journal/ArticleRef.js';
import type { ArticleRepository } from '../../persistence/repositories/ArticleRepository.js';
import { CatalogError, JournalOperationError } from '../../utils/errors.js';
import { httpStatusFor } from './results.js';

const newArticleSchema = articleRefSchema.extend({
  id: articleRefSchema.shape.id.optional(),
});
const idSchema = articleRefSchema.shape.id;

function invalid(res: Response, message: string): void {
  const failure = { status: 'error' as const, errorKind: 'InvalidArgument' as const, message };
  res.status(httpStatusFor(failure)).json(failure);
}

/**
 * Thin CRUD over the article catalog.
 */
export function createCatalogRouter(articleRepository: ArticleRepository): Router {
  const router = express.Router();

  router.post('/', (req, res) => {
    const parsed = newArticleSchema.safeParse(req.body);
    if (!parsed.success) {
      invalid(res, `Invalid article: ${formatIssues(parsed.error)}`);
      return;
    }
    try {
      const article = articleRepository.create(parsed.data);
      res.status(201).json({ status: 'success', article });
    } catch (error) {
      if (error instanceof CatalogError) {
        invalid(res, error.message);
        return;
      }
      throw error;
    }
  });

  router.get('/', (req, res) => {
    // With author, title and publishedAt this is a lookup by key.
    if (req.query.author !== undefined || req.query.title !== undefined) {
      const key = articleKeySchema.safeParse(req.query);
      if (!key.success) {
        invalid(res, `Invalid article key: ${formatIssues(key.error)}`);
        return;
      }
      const article = articleRepository.getByKey(key.data);
      if (!article) {
        res.status(404).json({ status: 'error', errorKind: 'NotFound', message: 'Article not found' });
        return;
      }
      res.status(200).json({ status: 'success', article });
      return;
    }
    const articles = articleRepository.listAll(req.query.sort === 'readCount');
    res.status(200).json({ status: 'success', articles });
  });

  router.get('/:id', (req, res) => {
    const id = idSchema.safeParse(req.params.id);
    if (!id.success) {
      invalid(res, `Invalid article id: ${req.params.id}`);
      return;
    }
    const article = articleRepository.getById(id.data);
    if (!article) {
      res.status(404).json({
        status: 'error',
        errorKind: 'NotFound',
        message: `Article with id ${id.data} not found`,
      });
      return;
    }
    res.status(200).json({ status: 'success', article });
  });

  router.delete('/:id', (req, res) => {
    const id = idSchema.safeParse(req.params.id);
    if (!id.success) {
      invalid(res, `Invalid article id: ${req.params.id}`);
      return;
    }
    try {
      articleRepository.softDelete(id.data);
      res.status(200).json({ status: 'success' });
    } catch (error) {
      if (error instanceof JournalOperationError) {
        const failure = { status: 'error' as const, errorKind: error.kind, message: error.message };
        res.status(httpStatusFor(failure)).json(failure);
        return;
      }
      if (error instanceof CatalogError) {
        invalid(res, error.message);
        return;
      }
      throw error;
    }
  });

  router.delete('/', (_req, res) => {
    articleRepository.clear();
    res.status(200).json({ status: 'success' });
  });

  return router;
}
