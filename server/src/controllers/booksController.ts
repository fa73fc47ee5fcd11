import type { Request, Response } from 'express';

import type { CatalogDatabase } from '../config/database.js';
import { listAuthors } from '../services/authorService.js';
import {
  createBook,
  deleteBook as deleteBookWithAuthor,
  listBooks as queryBooks,
} from '../services/bookService.js';
import { AppError } from '../utils/errors.js';
import type { Author, DeleteBookResult } from '../utils/types.js';
import {
  BookFormSchema,
  BookListQuerySchema,
  readForm,
} from '../utils/validation.js';

export const BOOK_NOT_FOUND_MESSAGE = 'Book not found (already deleted).';

export function createBooksController(db: CatalogDatabase) {
  function listBooks(req: Request, res: Response) {
    try {
      const { q, sort, order, msg } = BookListQuerySchema.parse(req.query);
      const books = queryBooks(db, { q, sort, order });

      res.json({
        books,
        currentSort: sort,
        currentOrder: order,
        searchQuery: q,
        message: msg ?? null,
      });
    } catch (error) {
      console.error('Error fetching books from the database:', error);
      res.status(500).json({ error: 'Failed to fetch books.' });
    }
  }

  function getBookForm(req: Request, res: Response) {
    try {
      res.json({
        authors: listAuthors(db),
        successMessage: null,
        errorMessage: null,
      });
    } catch (error) {
      console.error('Error fetching authors:', error);
      res.status(500).json({ error: 'Failed to fetch authors.' });
    }
  }

  function addBook(req: Request, res: Response) {
    let authors: Author[] = [];

    try {
      authors = listAuthors(db);
      const book = createBook(db, readForm(BookFormSchema, req.body));

      res.status(201).json({
        authors,
        book,
        successMessage: 'Book added successfully!',
        errorMessage: null,
      });
    } catch (error) {
      if (error instanceof AppError) {
        res.status(error.status).json({
          authors,
          successMessage: null,
          errorMessage: error.message,
        });
        return;
      }
      console.error('Error creating book:', error);
      res.status(500).json({ error: 'Failed to create book.' });
    }
  }

  /**
   * POST only, so a followed link can never delete anything. Always
   * redirects home with the outcome in `msg`.
   */
  function deleteBook(req: Request, res: Response) {
    const bookId = Number(req.params.bookId);

    try {
      // Ids past the safe integer range would round onto another row.
      const result: DeleteBookResult = Number.isSafeInteger(bookId)
        ? deleteBookWithAuthor(db, bookId)
        : { deleted: false };
      const msg = result.deleted
        ? `Deleted "${result.title}" successfully.`
        : BOOK_NOT_FOUND_MESSAGE;

      res.redirect(`/?${new URLSearchParams({ msg })}`);
    } catch (error) {
      console.error('Error deleting book:', error);
      res.status(500).json({ error: 'Failed to delete book.' });
    }
  }

  return { listBooks, getBookForm, addBook, deleteBook };
}
