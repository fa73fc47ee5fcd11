import express from 'express';

import type { CatalogDatabase } from '../config/database.js';
import { createAuthorsController } from '../controllers/authorsController.js';

export function createAuthorRouter(db: CatalogDatabase) {
  const router = express.Router();
  const { getAuthorForm, addAuthor } = createAuthorsController(db);

  router.get('/add_author', getAuthorForm);
  router.post('/add_author', addAuthor);

  return router;
}
