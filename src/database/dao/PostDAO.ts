/**
 * PostDAO - PostgreSQL-backed PostStore
 */

import { db, DatabaseConnection } from '../connection';
import { CreatePostData, PageRequest, Post } from '../models';
import { compilePredicate, matchAll, PostPredicate } from '../predicate';
import { DatabaseError } from '../../middleware/errorHandler';
import { createLogger, Logger } from '../../utils/logger';
import { PostStore, PostWriter } from './PostStore';

const SCHEMA_STATEMENTS = [
  `
    CREATE TABLE IF NOT EXISTS posts (
      id SERIAL PRIMARY KEY,
      category TEXT NOT NULL,
      content TEXT
    )
  `,
  `CREATE INDEX IF NOT EXISTS idx_posts_category ON posts (category)`,
];

export class PostDAO implements PostStore, PostWriter {
  private logger: Logger;

  constructor(private readonly connection: DatabaseConnection = db) {
    this.logger = createLogger('PostDAO');
  }

  /**
   * Creates the posts table and its category index when missing
   */
  async ensureSchema(): Promise<void> {
    try {
      await this.connection.transaction(async (query) => {
        for (const statement of SCHEMA_STATEMENTS) {
          await query(statement);
        }
      });
      this.logger.info('Posts schema is ready');
    } catch (error) {
      this.logger.error('Failed to create posts schema', { error });
      throw new DatabaseError('Failed to create posts schema', error);
    }
  }

  async countMatching(predicate: PostPredicate = matchAll): Promise<number> {
    const where = compilePredicate(predicate);
    const query = `SELECT COUNT(*) AS total FROM posts WHERE ${where.text}`;

    try {
      const result = await this.connection.query<{ total: string }>(
        query,
        where.values,
      );
      return parseInt(result.rows[0]?.total ?? '0', 10);
    } catch (error) {
      this.logger.error('Failed to count posts', { predicate, error });
      throw new DatabaseError('Failed to count posts', error);
    }
  }

  async fetchPage(predicate: PostPredicate, page: PageRequest): Promise<Post[]> {
    const where = compilePredicate(predicate);
    const offsetParam = where.values.length + 1;
    const query = `
      SELECT id, category, content
      FROM posts
      WHERE ${where.text}
      ORDER BY id ASC
      OFFSET $${offsetParam} LIMIT $${offsetParam + 1}
    `;

    try {
      const result = await this.connection.query<Post>(query, [
        ...where.values,
        page.offset,
        page.limit,
      ]);
      return result.rows;
    } catch (error) {
      this.logger.error('Failed to fetch posts page', { predicate, page, error });
      throw new DatabaseError('Failed to fetch posts', error);
    }
  }

  /**
   * Inserts posts in one transaction and returns them with their ids
   */
  async createMany(posts: CreatePostData[]): Promise<Post[]> {
    if (posts.length === 0) {
      return [];
    }

    try {
      const created = await this.connection.transaction(async (query) => {
        const rows: Post[] = [];
        for (const post of posts) {
          const result = await query<Post>(
            `INSERT INTO posts (category, content) VALUES ($1, $2) RETURNING id, category, content`,
            [post.category, post.content ?? null],
          );
          rows.push(...result.rows);
        }
        return rows;
      });

      this.logger.info(`Inserted ${created.length} posts`);
      return created;
    } catch (error) {
      this.logger.error('Failed to insert posts', { error });
      throw new DatabaseError('Failed to insert posts', error);
    }
  }
}

export const postDAO = new PostDAO();
