import { Router, Request, Response, NextFunction } from 'express';
import { buildPaginationResponse, parsePagination } from '../middleware/pagination';
import type { ServiceContext } from '../services/context';

export function createChangesRouter(ctx: ServiceContext): Router {
  const router = Router();

  // GET /api/v1/changes?limit=&cursor=
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit, cursor } = parsePagination(req);
      const page = await ctx.store.listChanges(limit + 1, cursor);
      res.json(buildPaginationResponse(page.rows, limit, page.totalCount));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
