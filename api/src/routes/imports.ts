import express, { Router, Request, Response, NextFunction } from 'express';
import type { ServiceContext } from '../services/context';
import { readColumnMapping } from '../services/csvFormat';
import { runImport } from '../services/importService';

type ImportParams = { id: string };

export function createImportsRouter(ctx: ServiceContext, uploadLimit: string): Router {
  const router = Router({ mergeParams: true });

  // any content type: spreadsheets upload as text/csv, text/plain or octet-stream
  router.use(express.raw({ type: () => true, limit: uploadLimit }));

  // POST /api/v1/assessments/:id/imports?student=&score=&comment=
  router.post('/', async (req: Request<ImportParams>, res: Response, next: NextFunction) => {
    try {
      const assessmentId = req.params.id;
      const body: unknown = req.body;
      const upload = Buffer.isBuffer(body) ? body : Buffer.alloc(0);
      const mapping = readColumnMapping({
        student: req.query.student,
        score: req.query.score,
        comment: req.query.comment,
      });

      ctx.logger.info({
        module: 'routes.imports',
        assessment_id: assessmentId,
        size_bytes: upload.length,
        mapping,
      }, 'Import requested');

      const report = await runImport(ctx, assessmentId, upload, mapping);
      res.json({ data: report });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
