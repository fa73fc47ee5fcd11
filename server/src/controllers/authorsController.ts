import type { Request, Response } from 'express';

import type { CatalogDatabase } from '../config/database.js';
import { createAuthor } from '../services/authorService.js';
import { AppError } from '../utils/errors.js';
import { AuthorFormSchema, readForm } from '../utils/validation.js';

export function createAuthorsController(db: CatalogDatabase) {
  function getAuthorForm(req: Request, res: Response) {
    res.json({ successMessage: null, errorMessage: null });
  }

  function addAuthor(req: Request, res: Response) {
    try {
      const author = createAuthor(db, readForm(AuthorFormSchema, req.body));

      res.status(201).json({
        author,
        successMessage: 'Author added successfully!',
        errorMessage: null,
      });
    } catch (error) {
      if (error instanceof AppError) {
        res
          .status(error.status)
          .json({ successMessage: null, errorMessage: error.message });
        return;
      }
      console.error('Error creating author:', error);
      res.status(500).json({ error: 'Failed to create author.' });
    }
  }

  return { getAuthorForm, addAuthor };
}
