/**
 * DAO (Data Access Object) exports
 */

export * from './PostStore';
export * from './PostDAO';
export * from './InMemoryPostStore';
