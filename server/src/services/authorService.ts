import type { CatalogDatabase } from '../config/database.js';
import {
  ConflictError,
  ValidationError,
  isConstraintViolation,
} from '../utils/errors.js';
import type { Author } from '../utils/types.js';
import {
  type AuthorForm,
  AuthorFormSchema,
  parseIsoDate,
  readForm,
} from '../utils/validation.js';

export const AUTHOR_COLUMNS =
  'id, name, birth_date AS birthDate, date_of_death AS dateOfDeath';

type AuthorInsert = {
  name: string;
  nameNormalized: string;
  birthDate: string;
  dateOfDeath: string | null;
};

export function normalizeAuthorName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Validates the form and inserts a new author. Dates must be real calendar
 * dates written YYYY-MM-DD; a malformed one raises `ParseError`.
 */
export function createAuthor(db: CatalogDatabase, form: AuthorForm): Author {
  // Direct callers get the same trimming and blank checks as form posts.
  const { name, birth_date, date_of_death } = readForm(AuthorFormSchema, form);

  if (!name || !birth_date) {
    throw new ValidationError('Name and birth date are required.');
  }

  const birthDate = parseIsoDate(birth_date, 'Birth date');
  const dateOfDeath = date_of_death
    ? parseIsoDate(date_of_death, 'Date of death')
    : null;

  let author: Author | undefined;
  try {
    author = db
      .prepare<AuthorInsert, Author>(
        `INSERT INTO author (name, name_normalized, birth_date, date_of_death)
         VALUES (@name, @nameNormalized, @birthDate, @dateOfDeath)
         RETURNING ${AUTHOR_COLUMNS}`
      )
      .get({
        name,
        nameNormalized: normalizeAuthorName(name),
        birthDate,
        dateOfDeath,
      });
  } catch (error) {
    if (isConstraintViolation(error, 'SQLITE_CONSTRAINT_UNIQUE')) {
      throw new ConflictError(`An author named "${name}" already exists.`);
    }
    throw error;
  }

  if (!author) {
    throw new Error('Author insert returned no row.');
  }
  return author;
}

export function listAuthors(db: CatalogDatabase): Author[] {
  return db
    .prepare<[], Author>(`SELECT ${AUTHOR_COLUMNS} FROM author ORDER BY name, id`)
    .all();
}

export function findAuthor(
  db: CatalogDatabase,
  authorId: number
): Author | undefined {
  return db
    .prepare<[number], Author>(`SELECT ${AUTHOR_COLUMNS} FROM author WHERE id = ?`)
    .get(authorId);
}
