/**
 * Database models index - exports all model types and interfaces
 */

export * from './Post';

export interface PageRequest {
  offset: number;
  limit: number;
}
