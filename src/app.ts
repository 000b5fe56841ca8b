import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import path from 'path';

import type { AppConfig } from '@/config/app.config';
import { TokenVerifier } from '@/auth/tokenVerifier';
import type { CatalogDatabase } from '@/db';
import { authenticateToken } from '@/middleware/auth';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler } from '@/middleware/errorHandler';
import { notFoundHandler } from '@/middleware/notFoundHandler';
import { createImageUpload } from '@/middleware/upload';
import { CategoryRepository } from '@/repositories/categoryRepository';
import { ProductRepository } from '@/repositories/productRepository';
import { createApiRouter } from '@/routes';
import { CatalogService } from '@/services/catalogService';
import { HttpShopDirectoryClient, type ShopDirectoryClient } from '@/services/shopDirectory';
import type { SkuGenerator } from '@/services/sku';
import { requestTimeout } from '@/stability/errorHandlers';

export interface AppDependencies {
  config: AppConfig;
  db: CatalogDatabase;
  /** Defaults to the HTTP client for the configured shop service. */
  directory?: ShopDirectoryClient;
  generateSku?: SkuGenerator;
}

export interface CatalogApp {
  app: express.Express;
  catalog: CatalogService;
}

export function createApp({ config, db, directory, generateSku }: AppDependencies): CatalogApp {
  const catalog = new CatalogService({
    products: new ProductRepository(db),
    categories: new CategoryRepository(db),
    directory: directory ?? new HttpShopDirectoryClient(config),
    defaultPageSize: config.pageSize,
    defaultRadiusKm: config.defaultRadiusKm,
    generateSku,
  });
  const verifier = new TokenVerifier(config);
  const upload = createImageUpload(config);

  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: [...config.corsOrigins], credentials: true }));

  if (config.nodeEnv !== 'development') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: 100,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(requestTimeout(config.requestTimeoutMs));
  app.use(attachCorrelationId);

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  app.use('/uploads', express.static(path.resolve(config.uploads.path)));

  app.use(compression());

  if (config.nodeEnv === 'development') {
    app.use(morgan('dev'));
  } else if (config.nodeEnv === 'production') {
    app.use(morgan('combined'));
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  app.use('/api', authenticateToken(verifier), createApiRouter(catalog, upload));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return { app, catalog };
}
