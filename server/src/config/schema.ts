/**
 * Catalog tables. `book.author_id` is a real foreign key, so the store itself
 * rejects a book pointing at an unknown author once `foreign_keys` is on.
 */
export const CATALOG_SCHEMA = `
CREATE TABLE IF NOT EXISTS author (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name VARCHAR(255) NOT NULL,
  name_normalized VARCHAR(255) NOT NULL UNIQUE,
  birth_date DATE NOT NULL,
  date_of_death DATE
);

CREATE TABLE IF NOT EXISTS book (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  isbn VARCHAR(255) NOT NULL UNIQUE,
  title VARCHAR(255) NOT NULL,
  publication_year INTEGER NOT NULL,
  author_id INTEGER NOT NULL REFERENCES author(id)
);

CREATE INDEX IF NOT EXISTS book_author_id_idx ON book(author_id);
`;
