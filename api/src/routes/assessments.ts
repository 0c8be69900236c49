import { Router, Request, Response, NextFunction } from 'express';
import { ValidationError } from '../errors';
import {
  archiveAssessment,
  assignGradeKey,
  buildTemplate,
  createAssessment,
  deleteAssessment,
  getAssessment,
  listAssessments,
  readCourseRef,
} from '../services/assessmentService';
import type { ServiceContext } from '../services/context';
import { readBody, readDelimiter, readNumber, readOptionalString } from './params';

export function createAssessmentsRouter(ctx: ServiceContext): Router {
  const router = Router();

  // POST /api/v1/assessments
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = readBody(req);
      if (typeof body.title !== 'string' || typeof body.grade_key_id !== 'string') {
        throw new ValidationError('title and grade_key_id are required');
      }
      const assessment = await createAssessment(ctx, {
        title: body.title,
        courseRef: readCourseRef(body.course_ref),
        maxScore: readNumber(body.max_score, 'max_score'),
        weight: body.weight === undefined ? 1 : readNumber(body.weight, 'weight'),
        gradeKeyId: body.grade_key_id,
        heldOn: readOptionalString(body.held_on, 'held_on'),
      });
      res.status(201).json({ data: assessment });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/v1/assessments?include_archived=true
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const includeArchived = req.query.include_archived === 'true';
      res.json({ data: await listAssessments(ctx, includeArchived) });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/v1/assessments/:id
  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: await getAssessment(ctx, req.params.id) });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/assessments/:id/archive
  router.post('/:id/archive', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: await archiveAssessment(ctx, req.params.id) });
    } catch (err) {
      next(err);
    }
  });

  // PUT /api/v1/assessments/:id/grade-key
  router.put('/:id/grade-key', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = readBody(req);
      if (typeof body.grade_key_id !== 'string') {
        throw new ValidationError('grade_key_id is required');
      }
      res.json({ data: await assignGradeKey(ctx, req.params.id, body.grade_key_id) });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/v1/assessments/:id/template?delimiter=;
  router.get('/:id/template', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const csv = await buildTemplate(ctx, req.params.id, readDelimiter(req.query.delimiter));
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="assessment-${req.params.id.slice(0, 8)}.csv"`);
      res.send(csv);
    } catch (err) {
      next(err);
    }
  });

  // DELETE /api/v1/assessments/:id
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await deleteAssessment(ctx, req.params.id);
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
