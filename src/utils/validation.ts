/**
 * Validation schemas for the posts listing query string
 */

import { z } from 'zod';
import { PostQueryCriteria } from '../database/models';

export const MAX_PAGE_LIMIT = 100;
export const DEFAULT_PAGE_LIMIT = 10;

// Query values arrive as strings; repeated keys arrive as arrays
const integerParam = (name: string) =>
  z
    .string({ invalid_type_error: `${name} must be given once` })
    .regex(/^-?\d+$/, { message: `${name} must be an integer` })
    .transform((value) => parseInt(value, 10));

const categorySchema = z
  .string({ invalid_type_error: 'category must be given once' })
  .optional()
  .transform((value) => (value ? value : undefined));

// Repetition means "all of". A blank keyword is kept: it matches any post
// that has content, and never one whose content is NULL.
const keywordsSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) =>
    value === undefined || Array.isArray(value) ? value : [value],
  );

export const listPostsQuerySchema = z.object({
  category: categorySchema,
  keywords: keywordsSchema,
  offset: integerParam('offset')
    .pipe(
      z
        .number()
        .int()
        .min(0, { message: 'offset must be at least 0' })
        .max(Number.MAX_SAFE_INTEGER, { message: 'offset is too large' }),
    )
    .default('0'),
  limit: integerParam('limit')
    .pipe(
      z
        .number()
        .int()
        .min(1, { message: 'limit must be at least 1' })
        .max(MAX_PAGE_LIMIT, {
          message: `limit must be at most ${MAX_PAGE_LIMIT}`,
        }),
    )
    .default(String(DEFAULT_PAGE_LIMIT)),
});

export type ListPostsQuery = z.infer<typeof listPostsQuerySchema>;

/**
 * Parses `req.query` into pipeline criteria; throws ZodError on invalid input.
 */
export function parseListPostsQuery(query: unknown): PostQueryCriteria {
  const parsed: ListPostsQuery = listPostsQuerySchema.parse(query);
  return {
    category: parsed.category,
    keywords: parsed.keywords,
    offset: parsed.offset,
    limit: parsed.limit,
  };
}
