/**
 * Post routes - read-only listing with filters, pagination and word frequencies
 */

import express, { Request, Response } from 'express';
import { PostQueryService } from '../services/PostQueryService';
import { parseListPostsQuery } from '../utils/validation';
import { asyncHandler } from '../middleware/errorHandler';
import { createLogger } from '../utils/logger';

const routeLogger = createLogger('PostRoutes');

export const createPostRoutes = (postQueryService: PostQueryService) => {
  const router = express.Router();

  /**
   * GET /posts/
   * ?category=tech&keywords=python&keywords=async&offset=0&limit=10
   */
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const criteria = parseListPostsQuery(req.query);

      routeLogger.debug('Listing posts', criteria);

      const result = await postQueryService.getProcessedPosts(criteria);

      res.json(result);
    }),
  );

  return router;
};

export default createPostRoutes;
