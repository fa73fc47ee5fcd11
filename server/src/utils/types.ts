export type Author = {
  id: number;
  name: string;
  birthDate: string;
  dateOfDeath: string | null;
};

export type Book = {
  id: number;
  isbn: string;
  title: string;
  publicationYear: number;
  authorId: number;
};

export interface BookWithAuthor extends Book {
  author: Author;
}

export type SortOption = 'title' | 'author';
export type OrderOption = 'asc' | 'desc';

export type BookListOptions = {
  q?: string;
  sort?: SortOption;
  order?: OrderOption;
};

export type DeleteBookResult =
  | { deleted: false }
  | {
      deleted: true;
      title: string;
      authorId: number;
      authorDeleted: boolean;
    };
