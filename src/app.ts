import express from 'express';
import { parse, ParsedUrlQuery } from 'querystring';
import helmet from 'helmet';
import cors from 'cors';
import config from './config';
import createPostRoutes from './routes/posts';
import { PostQueryService } from './services/PostQueryService';
import { PostStore } from './database/dao/PostStore';
import { db } from './database/connection';
import {
  requestLogger,
  errorHandler,
  notFoundHandler,
} from './middleware/errorHandler';

export const SERVICE_NAME = 'Posts API';
export const SERVICE_VERSION = '1.0.0';

/**
 * Flat query parsing: repeated keys become arrays and `a[b]=c` stays a plain
 * key. Unlike express's `simple` setting there is no cap on the number of
 * parameters, so a long `keywords` list is never cut short.
 */
export const parseQueryString = (str: string): ParsedUrlQuery =>
  parse(str, '&', '=', { maxKeys: 0 });

export interface AppDependencies {
  store: PostStore;
  /** Reported by /health, e.g. "postgres" or "memory" */
  storeName?: string;
}

export const createApp = ({ store, storeName }: AppDependencies) => {
  const app = express();
  const postQueryService = new PostQueryService(store);

  app.set('query parser', parseQueryString);

  // Security middleware
  app.use(helmet());
  app.use(cors());

  app.use(requestLogger);

  app.get('/health', (req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
      store: storeName ?? config.postStore,
      database: db.getStatus(),
    });
  });

  app.get('/', (req, res) => {
    res.json({
      message: `Welcome to the ${SERVICE_NAME}. List posts at GET /posts/`,
      version: SERVICE_VERSION,
      status: 'running',
    });
  });

  app.use('/posts', createPostRoutes(postQueryService));

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  return app;
};

export default createApp;
