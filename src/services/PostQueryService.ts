/**
 * PostQueryService - filter, count, paginate and annotate posts on read
 */

import { PostStore } from '../database/dao/PostStore';
import {
  PaginatedPosts,
  Post,
  PostQueryCriteria,
  ProcessedPost,
} from '../database/models';
import { buildPostPredicate } from '../database/predicate';
import { createLogger, Logger } from '../utils/logger';
import { calculateWordFrequency } from '../utils/wordFrequency';

export class PostQueryService {
  private logger: Logger;

  constructor(private readonly store: PostStore) {
    this.logger = createLogger('PostQueryService');
  }

  /**
   * Counts every match (ignoring paging), then fetches one ascending-id page.
   * The two reads are not a snapshot; a concurrent write may land between them.
   */
  async getProcessedPosts(criteria: PostQueryCriteria): Promise<PaginatedPosts> {
    const predicate = buildPostPredicate(criteria);

    const totalCount = await this.store.countMatching(predicate);
    const page = await this.store.fetchPage(predicate, {
      offset: criteria.offset,
      limit: criteria.limit,
    });

    this.logger.debug('Posts page fetched', {
      category: criteria.category,
      keywords: criteria.keywords,
      offset: criteria.offset,
      limit: criteria.limit,
      totalCount,
      returned: page.length,
    });

    return {
      total_count: totalCount,
      posts: page.map(toProcessedPost),
    };
  }
}

export const toProcessedPost = (post: Post): ProcessedPost => ({
  id: post.id,
  category: post.category,
  word_frequency: calculateWordFrequency(post.content),
});

export default PostQueryService;
