/**
 * Sample posts for local development; `npm run db:seed` loads them into PostgreSQL.
 */

import '../config';
import { db } from './connection';
import { CreatePostData } from './models';
import { matchAll } from './predicate';
import { PostStore, PostWriter } from './dao/PostStore';
import { postDAO } from './dao/PostDAO';
import { createLogger } from '../utils/logger';

const logger = createLogger('Seed');

export const samplePosts: CreatePostData[] = [
  { category: 'tech', content: 'SQLAlchemy is great for Python ORM.' },
  { category: 'news', content: 'FastAPI provides amazing speed.' },
  { category: 'tech', content: 'Async Python with asyncio is powerful.' },
  { category: 'tech', content: 'Another post about Python.' },
  { category: 'life', content: 'Simple life hacks.' },
  { category: 'tech', content: 'More Python content here.' },
];

/**
 * Inserts the sample posts only when the store holds none. Returns the number inserted.
 */
export async function seedSamplePosts(
  store: PostStore & PostWriter,
  posts: CreatePostData[] = samplePosts,
): Promise<number> {
  const existing = await store.countMatching(matchAll);
  if (existing > 0) {
    logger.info(`Store already holds ${existing} posts, skipping seed`);
    return 0;
  }

  const created = await store.createMany(posts);
  logger.info(`Seeded ${created.length} sample posts`);
  return created.length;
}

const main = async (): Promise<void> => {
  await db.connect();
  try {
    await postDAO.ensureSchema();
    await seedSamplePosts(postDAO);
  } finally {
    await db.disconnect();
  }
};

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Seeding failed', { error });
    process.exit(1);
  });
}
