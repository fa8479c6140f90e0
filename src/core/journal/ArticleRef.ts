import { z } from 'zod';
import { InvalidArgumentError } from '../../utils/errors.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/** Rejects dates that `Date.parse` rolls over, such as February 31st. */
function isCalendarDate(value: string): boolean {
  const day = value.slice(0, 10);
  const parsed = Date.parse(day);
  return !Number.isNaN(parsed) && new Date(parsed).toISOString().slice(0, 10) === day;
}

/**
 * A whole number, or a string of digits as it arrives in a path or form field.
 * Booleans, arrays and blank strings are rejected instead of coerced.
 */
export function wholeNumberInput(target: z.ZodNumber = z.number().int()) {
  return z
    .union([
      z.number(),
      z.string().trim().regex(/^-?\d+$/, 'must be a whole number').transform(Number),
    ])
    .pipe(target);
}

export const publishedAtSchema = z
  .string()
  .trim()
  .regex(ISO_DATE, 'publishedAt must be an ISO-8601 date')
  .refine((value) => !Number.isNaN(Date.parse(value)), 'publishedAt is not a valid date')
  .refine(isCalendarDate, 'publishedAt is not a calendar date')
  .refine((value) => Number(value.slice(0, 4)) > 1900, 'publishedAt year must be after 1900');

export const articleRefSchema = z.object({
  id: wholeNumberInput(z.number().int().positive()),
  name: z.string().default(''),
  author: z.string().trim().min(1, 'author is required'),
  title: z.string().trim().min(1, 'title is required'),
  url: z.string().default(''),
  content: z.string().default(''),
  publishedAt: publishedAtSchema,
  readingTimeSeconds: z.number().int().nonnegative().optional(),
});

/**
 * Snapshot of a catalog article at the moment it entered a journal.
 */
export type ArticleRef = Readonly<z.infer<typeof articleRefSchema>>;

export interface ArticleKey {
  author: string;
  title: string;
  publishedAt: string;
}

export const articleKeySchema = z.object({
  author: z.string().trim().min(1, 'author is required'),
  title: z.string().trim().min(1, 'title is required'),
  publishedAt: publishedAtSchema,
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function toArticleRef(input: unknown): ArticleRef {
  const result = articleRefSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid article: ${formatIssues(result.error)}`);
  }
  return Object.freeze(result.data);
}

export function matchesKey(article: ArticleRef, key: ArticleKey): boolean {
  return (
    article.author === key.author &&
    article.title === key.title &&
    article.publishedAt === key.publishedAt
  );
}
