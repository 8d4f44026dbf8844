/**
 * InMemoryPostStore tests
 */

import { InMemoryPostStore } from '../../src/database/dao/InMemoryPostStore';
import { categoryEquals, contentContains, matchAll } from '../../src/database/predicate';

describe('InMemoryPostStore', () => {
  it('should assign sequential ids and default missing content to null', async () => {
    const store = new InMemoryPostStore([{ category: 'tech', content: 'First' }]);

    const created = await store.createMany([{ category: 'misc' }]);

    expect(created).toEqual([{ id: 2, category: 'misc', content: null }]);
  });

  it('should count and page over matching posts only', async () => {
    const store = new InMemoryPostStore([
      { category: 'tech', content: 'one' },
      { category: 'news', content: 'two' },
      { category: 'tech', content: 'three' },
      { category: 'tech', content: 'four' },
    ]);

    await expect(store.countMatching(categoryEquals('tech'))).resolves.toBe(3);
    await expect(
      store.fetchPage(categoryEquals('tech'), { offset: 1, limit: 5 }),
    ).resolves.toEqual([
      { id: 3, category: 'tech', content: 'three' },
      { id: 4, category: 'tech', content: 'four' },
    ]);
    await expect(
      store.fetchPage(contentContains('T'), { offset: 0, limit: 1 }),
    ).resolves.toEqual([{ id: 2, category: 'news', content: 'two' }]);
  });

  it('should not let callers mutate stored posts', async () => {
    const store = new InMemoryPostStore([{ category: 'tech', content: 'original' }]);

    const [post] = await store.fetchPage(matchAll, { offset: 0, limit: 1 });
    post.content = 'changed';

    await expect(store.fetchPage(matchAll, { offset: 0, limit: 1 })).resolves.toEqual([
      { id: 1, category: 'tech', content: 'original' },
    ]);
  });
});
