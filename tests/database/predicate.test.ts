/**
 * Post predicate tests
 */

import {
  allOf,
  buildPostPredicate,
  categoryEquals,
  compilePredicate,
  contentContains,
  escapeLikePattern,
  matchAll,
  matchesPost,
} from '../../src/database/predicate';
import { Post } from '../../src/database/models';

const post = (id: number, category: string, content: string | null): Post => ({
  id,
  category,
  content,
});

describe('buildPostPredicate', () => {
  it('should match everything when no filters are given', () => {
    expect(buildPostPredicate({})).toEqual({ kind: 'all' });
    expect(buildPostPredicate({ category: '', keywords: [] })).toEqual({
      kind: 'all',
    });
  });

  it('should return a single filter without wrapping it', () => {
    expect(buildPostPredicate({ category: 'tech' })).toEqual({
      kind: 'category',
      category: 'tech',
    });
    expect(buildPostPredicate({ keywords: ['python'] })).toEqual({
      kind: 'keyword',
      keyword: 'python',
    });
  });

  it('should combine category and every keyword conjunctively', () => {
    expect(
      buildPostPredicate({ category: 'tech', keywords: ['python', 'async'] }),
    ).toEqual({
      kind: 'and',
      predicates: [
        { kind: 'category', category: 'tech' },
        { kind: 'keyword', keyword: 'python' },
        { kind: 'keyword', keyword: 'async' },
      ],
    });
  });
});

describe('allOf', () => {
  it('should drop match-all members', () => {
    expect(allOf(matchAll, categoryEquals('news'), matchAll)).toEqual({
      kind: 'category',
      category: 'news',
    });
    expect(allOf()).toEqual({ kind: 'all' });
  });
});

describe('matchesPost', () => {
  const asyncPost = post(3, 'tech', 'Async Python with asyncio is powerful.');

  it('should require exact category equality', () => {
    expect(matchesPost(categoryEquals('tech'), asyncPost)).toBe(true);
    expect(matchesPost(categoryEquals('Tech'), asyncPost)).toBe(false);
    expect(matchesPost(categoryEquals('tec'), asyncPost)).toBe(false);
  });

  it('should match keywords as case-insensitive substrings', () => {
    expect(matchesPost(contentContains('PYTHON'), asyncPost)).toBe(true);
    expect(matchesPost(contentContains('sync'), asyncPost)).toBe(true);
    expect(matchesPost(contentContains('rust'), asyncPost)).toBe(false);
  });

  it('should require every keyword of a conjunction', () => {
    const both = allOf(contentContains('python'), contentContains('async'));
    const oneMissing = allOf(contentContains('python'), contentContains('orm'));

    expect(matchesPost(both, asyncPost)).toBe(true);
    expect(matchesPost(oneMissing, asyncPost)).toBe(false);
  });

  it('should treat keyword text literally', () => {
    expect(matchesPost(contentContains('%'), post(1, 'deals', 'fifty off'))).toBe(
      false,
    );
    expect(matchesPost(contentContains('50%'), post(2, 'deals', '50% off'))).toBe(
      true,
    );
    expect(matchesPost(contentContains('.*'), post(3, 'deals', 'anything'))).toBe(
      false,
    );
  });

  it('should never match a keyword against missing content', () => {
    const empty = post(9, 'misc', null);

    expect(matchesPost(contentContains(''), empty)).toBe(false);
    expect(matchesPost(matchAll, empty)).toBe(true);
    expect(matchesPost(categoryEquals('misc'), empty)).toBe(true);
  });
});

describe('escapeLikePattern', () => {
  it('should escape LIKE wildcards and the escape character', () => {
    expect(escapeLikePattern('100%_off\\')).toBe('100\\%\\_off\\\\');
    expect(escapeLikePattern('plain')).toBe('plain');
  });
});

describe('compilePredicate', () => {
  it('should compile match-all to TRUE with no parameters', () => {
    expect(compilePredicate(matchAll)).toEqual({ text: 'TRUE', values: [] });
  });

  it('should compile a conjunction with numbered parameters', () => {
    const predicate = buildPostPredicate({
      category: 'tech',
      keywords: ['python', 'async'],
    });

    expect(compilePredicate(predicate)).toEqual({
      text: "(category = $1 AND content ILIKE $2 ESCAPE '\\' AND content ILIKE $3 ESCAPE '\\')",
      values: ['tech', '%python%', '%async%'],
    });
  });

  it('should start numbering at the requested parameter', () => {
    expect(compilePredicate(contentContains('orm'), 3)).toEqual({
      text: "content ILIKE $3 ESCAPE '\\'",
      values: ['%orm%'],
    });
  });

  it('should escape wildcards in keyword values', () => {
    expect(compilePredicate(contentContains('50%_off'))).toEqual({
      text: "content ILIKE $1 ESCAPE '\\'",
      values: ['%50\\%\\_off%'],
    });
  });

  it('should compile an empty conjunction to TRUE', () => {
    expect(compilePredicate({ kind: 'and', predicates: [] })).toEqual({
      text: 'TRUE',
      values: [],
    });
  });
});
