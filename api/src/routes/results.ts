import { Router, Request, Response, NextFunction } from 'express';
import type { ServiceContext } from '../services/context';
import { deleteResult, exportResultsCsv, listResults, recordManualResult } from '../services/resultService';
import { readBody, readDelimiter, readNumber, readOptionalString } from './params';

type ResultParams = { id: string; student?: string };

export function createResultsRouter(ctx: ServiceContext): Router {
  const router = Router({ mergeParams: true });

  // GET /api/v1/assessments/:id/results?format=json|csv
  router.get('/', async (req: Request<ResultParams>, res: Response, next: NextFunction) => {
    try {
      const assessmentId = req.params.id;
      if (req.query.format === 'csv') {
        const csv = await exportResultsCsv(ctx, assessmentId, readDelimiter(req.query.delimiter));
        res.setHeader('Content-Type', 'text/csv; charset=utf-8');
        res.setHeader('Content-Disposition', `attachment; filename="results-${assessmentId.slice(0, 8)}.csv"`);
        return res.send(csv);
      }
      res.json({ data: await listResults(ctx, assessmentId) });
    } catch (err) {
      next(err);
    }
  });

  // PUT /api/v1/assessments/:id/results/:student
  router.put('/:student', async (req: Request<ResultParams>, res: Response, next: NextFunction) => {
    try {
      const body = readBody(req);
      const outcome = await recordManualResult(
        ctx,
        req.params.id,
        req.params.student ?? '',
        readNumber(body.raw_score, 'raw_score'),
        readOptionalString(body.comment, 'comment'),
      );
      res.status(outcome.change === 'created' ? 201 : 200).json({ data: outcome.record, change: outcome.change });
    } catch (err) {
      next(err);
    }
  });

  // DELETE /api/v1/assessments/:id/results/:student
  router.delete('/:student', async (req: Request<ResultParams>, res: Response, next: NextFunction) => {
    try {
      const deleted = await deleteResult(ctx, req.params.id, req.params.student ?? '');
      if (!deleted) {
        return res.status(404).json({ error: { message: 'Result not found', type: 'NotFoundError', code: 'NOT_FOUND' } });
      }
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
