/**
 * Post model - a stored text post and the shapes derived from it on read
 */

export interface Post {
  id: number;
  category: string;
  content: string | null;
}

export interface CreatePostData {
  category: string;
  content?: string | null;
}

export type WordFrequency = Record<string, number>;

export interface ProcessedPost {
  id: number;
  category: string;
  word_frequency: WordFrequency;
}

export interface PaginatedPosts {
  total_count: number;
  posts: ProcessedPost[];
}

export interface PostQueryCriteria {
  category?: string;
  keywords?: string[];
  limit: number;
  offset: number;
}
