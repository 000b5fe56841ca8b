// src/routes/products.ts
import express, { Request, Response, NextFunction } from 'express';
import fs from 'fs';
import { requireAuth } from '@/middleware/auth';
import type { ImageUpload } from '@/middleware/upload';
import {
  serializeImage,
  serializeProduct,
  serializeProductPage,
  serializeRankedProduct,
} from '@/serializers/catalogSerializer';
import type { CatalogService } from '@/services/catalogService';
import { ValidationError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { mediaBaseUrl, pageUrl, parseId } from '@/utils/serverUtils';
import {
  productBodySchema,
  productListQuerySchema,
  productPatchSchema,
  productSearchQuerySchema,
  validate,
} from '@/validation/catalog.validation';

const MAX_ALT_TEXT_LENGTH = 200;

function uploadedFiles(req: Request): Express.Multer.File[] {
  if (req.file) return [req.file];
  return Array.isArray(req.files) ? req.files : [];
}

/** Removes files multer already stored for a request that ended up rejected. */
async function discardUploads(req: Request): Promise<void> {
  const results = await Promise.allSettled(uploadedFiles(req).map((f) => fs.promises.unlink(f.path)));
  for (const result of results) {
    if (result.status === 'rejected') {
      logger.warn('upload:cleanup_failed', { error: String(result.reason) });
    }
  }
}

function altTextList(raw: unknown): string[] {
  if (typeof raw === 'string') return [raw];
  if (Array.isArray(raw)) return raw.filter((t): t is string => typeof t === 'string');
  return [];
}

function checkAltText(altText: string): string {
  if (altText.length > MAX_ALT_TEXT_LENGTH) {
    throw new ValidationError('Invalid input', [
      { path: 'alt_text', message: `Ensure this field has no more than ${MAX_ALT_TEXT_LENGTH} characters.` },
    ]);
  }
  return altText;
}

export function createProductRoutes(catalog: CatalogService, upload: ImageUpload): express.Router {
  const router = express.Router();

  /**
   * GET /api/products
   * Query: category, price, sku, search, ordering, page, page_size
   */
  router.get('/', (req, res, next) => {
    try {
      const query = validate(productListQuerySchema, req.query);
      if (!query.success) {
        throw new ValidationError('Invalid query parameters', query.error);
      }

      const { category, price, sku, search, ordering, page, page_size } = query.data;
      const result = catalog.listProducts({
        filters: { categoryId: category, price, sku, search },
        ordering,
        page,
        pageSize: page_size,
      });

      res.json(serializeProductPage(result, mediaBaseUrl(req), (n) => pageUrl(req, n)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/products/search
   * Query: q, lat, lng, radius_km (default 5). With lat and lng the response
   * is a plain list ranked by distance, each item carrying `distance_km`.
   */
  router.get('/search', (req, res, next) => {
    try {
      const query = validate(productSearchQuerySchema, req.query);
      if (!query.success) {
        throw new ValidationError('Invalid query parameters', query.error);
      }

      const { q, lat, lng, radius_km, page, page_size } = query.data;
      const outcome = catalog.searchProducts({ q, lat, lng, radiusKm: radius_km, page, pageSize: page_size });
      const media = mediaBaseUrl(req);

      if (outcome.mode === 'geo') {
        res.json(outcome.results.map((r) => serializeRankedProduct(r.product, r.distanceKm, media)));
        return;
      }

      res.json(serializeProductPage(outcome.page, media, (n) => pageUrl(req, n)));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', (req, res, next) => {
    try {
      const product = catalog.getProduct(parseId(req.params.id));
      res.json(serializeProduct(product, mediaBaseUrl(req)));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', requireAuth, async (req, res, next) => {
    try {
      const body = validate(productBodySchema, req.body);
      if (!body.success) {
        throw new ValidationError('Invalid input', body.error);
      }

      const product = await catalog.createProduct(req.principal, body.data);
      res.status(201).json(serializeProduct(product, mediaBaseUrl(req)));
    } catch (error) {
      next(error);
    }
  });

  const update = (partial: boolean) => (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id);
      const body = partial ? validate(productPatchSchema, req.body) : validate(productBodySchema, req.body);
      if (!body.success) {
        throw new ValidationError('Invalid input', body.error);
      }

      const product = catalog.updateProduct(req.principal, id, body.data);
      res.json(serializeProduct(product, mediaBaseUrl(req)));
    } catch (error) {
      next(error);
    }
  };

  router.put('/:id', requireAuth, update(false));
  router.patch('/:id', requireAuth, update(true));

  router.delete('/:id', requireAuth, (req, res, next) => {
    try {
      catalog.deleteProduct(req.principal, parseId(req.params.id));
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  // ownership is checked before multer writes anything to disk
  const authorizeUpload = (req: Request, _res: Response, next: NextFunction) => {
    try {
      catalog.authorizeMutation(req.principal, parseId(req.params.id));
      next();
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/products/:id/upload-image
   * Multipart: image (file), alt_text
   */
  router.post('/:id/upload-image', requireAuth, authorizeUpload, upload.single, async (req, res, next) => {
    let saved = false;
    try {
      if (!req.file) {
        throw new ValidationError('No image uploaded');
      }
      const altText = checkAltText(altTextList(req.body?.alt_text)[0] ?? '');

      const [image] = catalog.addImages(req.principal, parseId(req.params.id), [
        { image: upload.storedPath(req.file), altText },
      ]);
      saved = true;
      res.status(201).json(serializeImage(image, mediaBaseUrl(req)));
    } catch (error) {
      // files stay once their rows exist
      if (!saved) await discardUploads(req);
      next(error);
    }
  });

  /**
   * POST /api/products/:id/upload-images
   * Multipart: images (up to 10 files), alt_texts (matched by position)
   */
  router.post('/:id/upload-images', requireAuth, authorizeUpload, upload.multiple, async (req, res, next) => {
    let saved = false;
    try {
      const files = uploadedFiles(req);
      if (files.length === 0) {
        throw new ValidationError('No images uploaded');
      }
      const altTexts = altTextList(req.body?.alt_texts);

      const images = catalog.addImages(
        req.principal,
        parseId(req.params.id),
        files.map((file, i) => ({ image: upload.storedPath(file), altText: checkAltText(altTexts[i] ?? '') })),
      );
      saved = true;
      const media = mediaBaseUrl(req);
      res.status(201).json(images.map((image) => serializeImage(image, media)));
    } catch (error) {
      // files stay once their rows exist
      if (!saved) await discardUploads(req);
      next(error);
    }
  });

  return router;
}
