import type { CatalogDatabase } from '../config/database.js';
import {
  ConflictError,
  ValidationError,
  isConstraintViolation,
} from '../utils/errors.js';
import type {
  Book,
  BookListOptions,
  BookWithAuthor,
  DeleteBookResult,
} from '../utils/types.js';
import {
  type BookForm,
  BookFormSchema,
  parseInteger,
  readForm,
} from '../utils/validation.js';

const BOOK_COLUMNS =
  'id, isbn, title, publication_year AS publicationYear, author_id AS authorId';

type BookInsert = {
  isbn: string;
  title: string;
  publicationYear: number;
  authorId: number;
};

type BookAuthorRow = Book & {
  authorName: string;
  authorBirthDate: string;
  authorDateOfDeath: string | null;
};

/**
 * Lists every book joined with its author in a single query.
 *
 * `q` matches case-insensitively against the book title or the author name.
 * Sorting by `author` orders by author name; anything else orders by title.
 * Ties always fall back to insertion order.
 */
export function listBooks(
  db: CatalogDatabase,
  options: BookListOptions = {}
): BookWithAuthor[] {
  const q = options.q?.trim() ?? '';
  const sortColumn = options.sort === 'author' ? 'a.name' : 'b.title';
  const direction = options.order === 'desc' ? 'DESC' : 'ASC';

  const rows = db
    .prepare<{ q: string }, BookAuthorRow>(
      `SELECT b.id, b.isbn, b.title,
              b.publication_year AS publicationYear,
              b.author_id AS authorId,
              a.name AS authorName,
              a.birth_date AS authorBirthDate,
              a.date_of_death AS authorDateOfDeath
         FROM book b
         INNER JOIN author a ON a.id = b.author_id
        WHERE @q = ''
           OR instr(lower(b.title), lower(@q)) > 0
           OR instr(lower(a.name), lower(@q)) > 0
        ORDER BY ${sortColumn} ${direction}, b.id ASC`
    )
    .all({ q });

  return rows.map((row) => ({
    id: row.id,
    isbn: row.isbn,
    title: row.title,
    publicationYear: row.publicationYear,
    authorId: row.authorId,
    author: {
      id: row.authorId,
      name: row.authorName,
      birthDate: row.authorBirthDate,
      dateOfDeath: row.authorDateOfDeath,
    },
  }));
}

export function findBook(
  db: CatalogDatabase,
  bookId: number
): Book | undefined {
  return db
    .prepare<[number], Book>(`SELECT ${BOOK_COLUMNS} FROM book WHERE id = ?`)
    .get(bookId);
}

/**
 * Validates the form and inserts a new book. The author reference is checked
 * by the store's foreign key; a dangling id is reported as a validation error.
 */
export function createBook(db: CatalogDatabase, form: BookForm): Book {
  const { title, publication_year, author_id, isbn } = readForm(
    BookFormSchema,
    form
  );

  if (!title || !publication_year || !author_id || !isbn) {
    throw new ValidationError(
      'Title, publication year, ISBN and author id are required.'
    );
  }

  const publicationYear = parseInteger(publication_year, 'Publication year');
  const authorId = parseInteger(author_id, 'Author id');

  let book: Book | undefined;
  try {
    book = db
      .prepare<BookInsert, Book>(
        `INSERT INTO book (isbn, title, publication_year, author_id)
         VALUES (@isbn, @title, @publicationYear, @authorId)
         RETURNING ${BOOK_COLUMNS}`
      )
      .get({ isbn, title, publicationYear, authorId });
  } catch (error) {
    if (isConstraintViolation(error, 'SQLITE_CONSTRAINT_FOREIGNKEY')) {
      throw new ValidationError(`Author ${authorId} does not exist.`);
    }
    if (isConstraintViolation(error, 'SQLITE_CONSTRAINT_UNIQUE')) {
      throw new ConflictError(`A book with ISBN "${isbn}" already exists.`);
    }
    throw error;
  }

  if (!book) {
    throw new Error('Book insert returned no row.');
  }
  return book;
}

/**
 * Deletes a book, and its author when that was the author's last book.
 * Both deletions run in one transaction. A missing book is not an error.
 */
export function deleteBook(
  db: CatalogDatabase,
  bookId: number
): DeleteBookResult {
  const remove = db.transaction((id: number): DeleteBookResult => {
    const book = findBook(db, id);
    if (!book) {
      return { deleted: false };
    }

    const { title, authorId } = book;

    const remaining = db
      .prepare<[number, number], { count: number }>(
        'SELECT COUNT(*) AS count FROM book WHERE author_id = ? AND id != ?'
      )
      .get(authorId, id);

    db.prepare<[number]>('DELETE FROM book WHERE id = ?').run(id);

    let authorDeleted = false;
    if (remaining?.count === 0) {
      // Another delete may already have removed the author; zero changes is fine.
      const result = db
        .prepare<[number]>('DELETE FROM author WHERE id = ?')
        .run(authorId);
      authorDeleted = result.changes > 0;
    }

    return { deleted: true, title, authorId, authorDeleted };
  });

  return remove(bookId);
}
