// src/routes/categories.ts
import express from 'express';
import { requireAuth } from '@/middleware/auth';
import { serializeCategory } from '@/serializers/catalogSerializer';
import type { CatalogService } from '@/services/catalogService';
import { ValidationError } from '@/utils/errors';
import { parseId } from '@/utils/serverUtils';
import { categoryBodySchema, validate } from '@/validation/catalog.validation';

export function createCategoryRoutes(catalog: CatalogService): express.Router {
  const router = express.Router();

  router.get('/', (_req, res) => {
    res.json(catalog.listCategories().map(serializeCategory));
  });

  router.get('/:id', (req, res, next) => {
    try {
      res.json(serializeCategory(catalog.getCategory(parseId(req.params.id))));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', requireAuth, (req, res, next) => {
    try {
      const body = validate(categoryBodySchema, req.body);
      if (!body.success) {
        throw new ValidationError('Invalid input', body.error);
      }
      res.status(201).json(serializeCategory(catalog.createCategory(req.principal, body.data)));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', requireAuth, (req, res, next) => {
    try {
      catalog.deleteCategory(req.principal, parseId(req.params.id));
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
