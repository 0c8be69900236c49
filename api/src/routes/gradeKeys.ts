import { Router, Request, Response, NextFunction } from 'express';
import { ValidationError } from '../errors';
import type { ServiceContext } from '../services/context';
import {
  FRACTION_DOMAIN,
  createGradeKey,
  deleteGradeKey,
  getGradeKey,
  listGradeKeys,
  normalizeScore,
  parseBandDefinition,
  readBands,
  resolveGrade,
  updateGradeKeyBands,
} from '../services/gradeKeyService';
import { checkScore } from '../services/resultService';
import type { GradeBand } from '../types';
import { readBody, readNumber } from './params';

function bandsFromBody(body: Record<string, unknown>): GradeBand[] {
  if (typeof body.definition === 'string') return parseBandDefinition(body.definition);
  return readBands(body.bands);
}

export function createGradeKeysRouter(ctx: ServiceContext): Router {
  const router = Router();

  // POST /api/v1/grade-keys (bands as JSON, or a "label;lower;upper" definition)
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = readBody(req);
      if (typeof body.name !== 'string') {
        throw new ValidationError('name is required');
      }
      const domainMax = body.domain_max === undefined ? FRACTION_DOMAIN : readNumber(body.domain_max, 'domain_max');
      const key = await createGradeKey(ctx, body.name, bandsFromBody(body), domainMax);
      res.status(201).json({ data: key });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/v1/grade-keys
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: await listGradeKeys(ctx) });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/v1/grade-keys/:id
  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: await getGradeKey(ctx, req.params.id) });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/v1/grade-keys/:id/resolve?raw_score=15&max_score=20
  router.get('/:id/resolve', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const key = await getGradeKey(ctx, req.params.id);
      const rawScore = readNumber(req.query.raw_score, 'raw_score');
      const maxScore = readNumber(req.query.max_score, 'max_score');
      if (maxScore <= 0) {
        throw new ValidationError('max_score must be greater than 0');
      }
      checkScore(rawScore, maxScore);
      res.json({
        data: {
          grade: resolveGrade(key, rawScore, maxScore),
          normalized: normalizeScore(rawScore, maxScore, key.domain_max),
        },
      });
    } catch (err) {
      next(err);
    }
  });

  // PUT /api/v1/grade-keys/:id
  router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const key = await updateGradeKeyBands(ctx, req.params.id, bandsFromBody(readBody(req)));
      res.json({ data: key });
    } catch (err) {
      next(err);
    }
  });

  // DELETE /api/v1/grade-keys/:id
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await deleteGradeKey(ctx, req.params.id);
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
