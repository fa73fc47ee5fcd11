import express from 'express';

import type { CatalogDatabase } from '../config/database.js';
import { createAuthorRouter } from './authorRoutes.js';
import { createBookRouter } from './bookRoutes.js';

export function createRoutes(db: CatalogDatabase) {
  const router = express.Router();

  router.use('/', createBookRouter(db));
  router.use('/', createAuthorRouter(db));

  return router;
}
