import { CreatePostData, PageRequest, Post } from '../models';
import { matchesPost, PostPredicate } from '../predicate';
import { PostStore, PostWriter } from './PostStore';

/**
 * Array-backed PostStore for running without PostgreSQL.
 * Ids are assigned sequentially from 1, so insertion order is id order.
 */
export class InMemoryPostStore implements PostStore, PostWriter {
  private readonly posts: Post[] = [];
  private nextId = 1;

  constructor(initial: CreatePostData[] = []) {
    this.insert(initial);
  }

  async countMatching(predicate: PostPredicate): Promise<number> {
    return this.posts.filter((post) => matchesPost(predicate, post)).length;
  }

  async fetchPage(predicate: PostPredicate, page: PageRequest): Promise<Post[]> {
    return this.posts
      .filter((post) => matchesPost(predicate, post))
      .slice(page.offset, page.offset + page.limit)
      .map((post) => ({ ...post }));
  }

  async createMany(posts: CreatePostData[]): Promise<Post[]> {
    return this.insert(posts);
  }

  private insert(posts: CreatePostData[]): Post[] {
    const created = posts.map((data) => ({
      id: this.nextId++,
      category: data.category,
      content: data.content ?? null,
    }));
    this.posts.push(...created);
    return created.map((post) => ({ ...post }));
  }
}
