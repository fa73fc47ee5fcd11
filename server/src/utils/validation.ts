import { z } from 'zod';

import { ParseError } from './errors.js';

// Blank strings count as missing; numbers from JSON bodies are read as text.
const formField = z.preprocess((value) => {
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}, z.string().optional());

export const AuthorFormSchema = z.object({
  name: formField,
  birth_date: formField,
  date_of_death: formField,
});

export const BookFormSchema = z.object({
  title: formField,
  publication_year: formField,
  author_id: formField,
  isbn: formField,
});

export const BookListQuerySchema = z.object({
  q: z.string().trim().catch(''),
  sort: z.enum(['title', 'author']).catch('title'),
  order: z.enum(['asc', 'desc']).catch('asc'),
  msg: z.string().optional().catch(undefined),
});

export type AuthorForm = z.infer<typeof AuthorFormSchema>;
export type BookForm = z.infer<typeof BookFormSchema>;
export type BookListQuery = z.infer<typeof BookListQuerySchema>;

/** Reads a request body into a form; anything that is not an object reads as an empty form. */
export function readForm<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown
): z.infer<T> {
  const result = schema.safeParse(body);
  return result.success ? result.data : schema.parse({});
}

const IsoDateSchema = z.string().date();
const IntegerSchema = z
  .string()
  .regex(/^[+-]?\d+$/)
  .transform(Number)
  .pipe(z.number().int().safe());

export function parseIsoDate(value: string, field: string): string {
  const result = IsoDateSchema.safeParse(value);
  if (!result.success) {
    throw new ParseError(
      `${field} must be a date in YYYY-MM-DD format, got "${value}".`
    );
  }
  return result.data;
}

export function parseInteger(value: string, field: string): number {
  const result = IntegerSchema.safeParse(value);
  if (!result.success) {
    throw new ParseError(`${field} must be a whole number, got "${value}".`);
  }
  return result.data;
}
