/** Route aggregator. */
import express from 'express';
import type { ImageUpload } from '@/middleware/upload';
import type { CatalogService } from '@/services/catalogService';
import { createCategoryRoutes } from './categories';
import { createProductRoutes } from './products';

export function createApiRouter(catalog: CatalogService, upload: ImageUpload): express.Router {
  const router = express.Router();
  router.use('/products', createProductRoutes(catalog, upload));
  router.use('/categories', createCategoryRoutes(catalog));
  return router;
}
