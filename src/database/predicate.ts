/**
 * Composable post filters shared by the query pipeline and every PostStore.
 *
 * A predicate is plain data: stores either evaluate it in process
 * (`matchesPost`) or compile it to a parameterized SQL condition
 * (`compilePredicate`).
 */

import { Post, PostQueryCriteria } from './models';

export type PostPredicate =
  | { kind: 'all' }
  | { kind: 'category'; category: string }
  | { kind: 'keyword'; keyword: string }
  | { kind: 'and'; predicates: PostPredicate[] };

export const matchAll: PostPredicate = { kind: 'all' };

export const categoryEquals = (category: string): PostPredicate => ({
  kind: 'category',
  category,
});

/** Case-insensitive substring of `content`. */
export const contentContains = (keyword: string): PostPredicate => ({
  kind: 'keyword',
  keyword,
});

export const allOf = (...predicates: PostPredicate[]): PostPredicate => {
  const parts = predicates.filter((p) => p.kind !== 'all');
  if (parts.length === 0) return matchAll;
  if (parts.length === 1) return parts[0];
  return { kind: 'and', predicates: parts };
};

/**
 * Category equality AND every keyword. No filters yields `matchAll`.
 */
export function buildPostPredicate(
  criteria: Pick<PostQueryCriteria, 'category' | 'keywords'>,
): PostPredicate {
  const parts: PostPredicate[] = [];
  if (criteria.category) {
    parts.push(categoryEquals(criteria.category));
  }
  for (const keyword of criteria.keywords ?? []) {
    parts.push(contentContains(keyword));
  }
  return allOf(...parts);
}

export function matchesPost(predicate: PostPredicate, post: Post): boolean {
  switch (predicate.kind) {
    case 'all':
      return true;
    case 'category':
      return post.category === predicate.category;
    case 'keyword':
      // NULL content never matches, as with SQL `NULL ILIKE ...`
      return (
        post.content !== null &&
        post.content.toLowerCase().includes(predicate.keyword.toLowerCase())
      );
    case 'and':
      return predicate.predicates.every((p) => matchesPost(p, post));
  }
}

export interface CompiledPredicate {
  text: string;
  values: string[];
}

/**
 * Escapes LIKE wildcards so user text is matched literally (escape char `\`).
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

/**
 * Compiles a predicate into a SQL condition over the `posts` columns,
 * numbering placeholders from `$firstParam`.
 */
export function compilePredicate(
  predicate: PostPredicate,
  firstParam = 1,
): CompiledPredicate {
  const values: string[] = [];

  const compile = (node: PostPredicate): string => {
    switch (node.kind) {
      case 'all':
        return 'TRUE';
      case 'category':
        values.push(node.category);
        return `category = $${firstParam + values.length - 1}`;
      case 'keyword':
        values.push(`%${escapeLikePattern(node.keyword)}%`);
        return `content ILIKE $${firstParam + values.length - 1} ESCAPE '\\'`;
      case 'and':
        if (node.predicates.length === 0) return 'TRUE';
        return `(${node.predicates.map(compile).join(' AND ')})`;
    }
  };

  return { text: compile(predicate), values };
}
