import express from 'express';

import type { CatalogDatabase } from '../config/database.js';
import { createBooksController } from '../controllers/booksController.js';

export function createBookRouter(db: CatalogDatabase) {
  const router = express.Router();
  const { listBooks, getBookForm, addBook, deleteBook } =
    createBooksController(db);

  /**
   * @route GET /
   * @desc List books, filtered by `q` and ordered by `sort`/`order`
   * @access Public
   */
  router.get('/', listBooks);

  /**
   * @route GET /add_book
   * @desc Authors to choose from when adding a book
   * @access Public
   */
  router.get('/add_book', getBookForm);
  router.post('/add_book', addBook);

  /**
   * @route POST /book/:bookId/delete
   * @desc Delete a book, and its author when no other book references them
   * @access Public
   */
  router.post('/book/:bookId(\\d+)/delete', deleteBook);

  return router;
}
