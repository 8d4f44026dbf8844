import { CreatePostData, PageRequest, Post } from '../models';
import { PostPredicate } from '../predicate';

/**
 * Read side consumed by the query pipeline.
 */
export interface PostStore {
  /** Number of posts matching the predicate across the whole store. */
  countMatching(predicate: PostPredicate): Promise<number>;
  /** Matching posts ordered by ascending id, skipping `offset`, at most `limit`. */
  fetchPage(predicate: PostPredicate, page: PageRequest): Promise<Post[]>;
}

export interface PostWriter {
  createMany(posts: CreatePostData[]): Promise<Post[]>;
}
