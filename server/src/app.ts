import bodyParser from 'body-parser';
import cors from 'cors';
import express from 'express';

import type { CatalogDatabase } from './config/database.js';
import { errorHandler, notFound } from './middleware/errorHandler.js';
import { createRoutes } from './routes/index.js';
import { createCorsOptions } from './utils/cors.js';

export function createApp(db: CatalogDatabase, allowedOrigins?: string[]) {
  const app = express();

  // Middleware
  app.use(cors(createCorsOptions(allowedOrigins)));
  app.use(bodyParser.json());
  app.use(bodyParser.urlencoded({ extended: false }));

  // Routes
  app.use('/', createRoutes(db));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
