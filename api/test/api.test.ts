import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../src/app';
import { loadConfig } from '../src/config';
import { CLASS_10A, STANDARD_BANDS, makeContext } from './helpers';

describe('grading API', () => {
  let app: Express;

  beforeEach(() => {
    const { ctx } = makeContext();
    app = createApp(ctx, loadConfig({}));
  });

  async function createFixture(): Promise<{ keyId: string; assessmentId: string }> {
    const keyRes = await request(app)
      .post('/api/v1/grade-keys')
      .send({ name: 'standard', bands: STANDARD_BANDS });
    expect(keyRes.status).toBe(201);

    const assessmentRes = await request(app)
      .post('/api/v1/assessments')
      .send({
        title: 'Klassenarbeit 1',
        course_ref: { kind: 'class', id: CLASS_10A },
        max_score: 20,
        grade_key_id: keyRes.body.data.id,
      });
    expect(assessmentRes.status).toBe(201);
    return { keyId: keyRes.body.data.id, assessmentId: assessmentRes.body.data.id };
  }

  it('GET /health returns ok', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('POST /api/v1/grade-keys accepts a text definition', async () => {
    const res = await request(app)
      .post('/api/v1/grade-keys')
      .send({ name: 'pass-fail', definition: 'bestanden;0,6;1\nnicht bestanden;0;0,6' });
    expect(res.status).toBe(201);
    expect(res.body.data.bands).toEqual([
      { label: 'nicht bestanden', lower_bound: 0, upper_bound: 0.6 },
      { label: 'bestanden', lower_bound: 0.6, upper_bound: 1 },
    ]);
  });

  it('POST /api/v1/grade-keys rejects overlapping bands and duplicate names', async () => {
    const overlap = await request(app)
      .post('/api/v1/grade-keys')
      .send({
        name: 'broken',
        bands: [
          { label: 'a', lower_bound: 0, upper_bound: 0.6 },
          { label: 'b', lower_bound: 0.5, upper_bound: 1 },
        ],
      });
    expect(overlap.status).toBe(400);
    expect(overlap.body.error).toMatchObject({ type: 'InvalidRangeError', code: 'INVALID_RANGE' });

    await createFixture();
    const duplicate = await request(app)
      .post('/api/v1/grade-keys')
      .send({ name: 'standard', bands: STANDARD_BANDS });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body.error.code).toBe('DUPLICATE_NAME');
  });

  it('GET /api/v1/grade-keys/:id/resolve grades a single score', async () => {
    const { keyId } = await createFixture();

    const ok = await request(app).get(`/api/v1/grade-keys/${keyId}/resolve?raw_score=15&max_score=20`);
    expect(ok.status).toBe(200);
    expect(ok.body.data).toEqual({ grade: 'gut', normalized: 0.75 });

    const outside = await request(app).get(`/api/v1/grade-keys/${keyId}/resolve?raw_score=25&max_score=20`);
    expect(outside.status).toBe(422);
    expect(outside.body.error.code).toBe('SCORE_OUT_OF_RANGE');
  });

  it('POST /api/v1/assessments validates the course reference', async () => {
    const { keyId } = await createFixture();
    const res = await request(app)
      .post('/api/v1/assessments')
      .send({ title: 'Ohne Kurs', max_score: 10, grade_key_id: keyId });
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('imports a filled-in template and exports the results', async () => {
    const { assessmentId } = await createFixture();

    const template = await request(app).get(`/api/v1/assessments/${assessmentId}/template`);
    expect(template.status).toBe(200);
    expect(template.headers['content-type']).toContain('text/csv');

    const [header, ...lines] = template.text.split('\n');
    const filled = lines.map((line, idx) => {
      const fields = line.split(';');
      fields[3] = String(10 + idx);
      return fields.join(';');
    });

    const upload = await request(app)
      .post(`/api/v1/assessments/${assessmentId}/imports`)
      .set('Content-Type', 'text/csv')
      .send([header, ...filled].join('\n'));
    expect(upload.status).toBe(200);
    expect(upload.body.data.status).toBe('fully_accepted');
    expect(upload.body.data.counts).toMatchObject({ total: 10, created: 10 });

    const exported = await request(app).get(`/api/v1/assessments/${assessmentId}/results?format=csv`);
    const exportLines = exported.text.split('\n');
    expect(exportLines[0]).toBe('student;last_name;first_name;score;grade;comment');
    expect(exportLines[1]).toBe('stud_1;Adler;Kind1;10;nicht bestanden;');
    expect(exportLines).toHaveLength(11);
  });

  it('POST /api/v1/assessments/:id/imports maps columns from the query', async () => {
    const { assessmentId } = await createFixture();
    const res = await request(app)
      .post(`/api/v1/assessments/${assessmentId}/imports?student=Nr&score=2`)
      .set('Content-Type', 'text/plain')
      .send('Nr,Name,Punkte\nstud_1,Adler,"14,5"');
    expect(res.status).toBe(200);
    expect(res.body.data.rows).toEqual([
      {
        row_number: 2,
        status: 'accepted',
        student_identifier: 'stud_1',
        raw_score: 14.5,
        derived_grade: 'befriedigend',
        change: 'created',
      },
    ]);
  });

  it('POST /api/v1/assessments/:id/imports fails unreadable files and unknown assessments', async () => {
    const { assessmentId } = await createFixture();

    const unreadable = await request(app)
      .post(`/api/v1/assessments/${assessmentId}/imports`)
      .set('Content-Type', 'text/csv')
      .send('just one column\nstud_1');
    expect(unreadable.status).toBe(422);
    expect(unreadable.body.error.code).toBe('UNRECOGNIZED_FORMAT');

    const missing = await request(app)
      .post('/api/v1/assessments/does-not-exist/imports')
      .set('Content-Type', 'text/csv')
      .send('student;score\nstud_1;10');
    expect(missing.status).toBe(404);
    expect(missing.body.error.code).toBe('NOT_FOUND');
  });

  it('PUT and DELETE a single result', async () => {
    const { assessmentId } = await createFixture();
    const url = `/api/v1/assessments/${assessmentId}/results/stud_1`;

    const created = await request(app).put(url).send({ raw_score: '12,5', comment: 'nachgereicht' });
    expect(created.status).toBe(201);
    expect(created.body.change).toBe('created');
    expect(created.body.data).toMatchObject({ raw_score: 12.5, derived_grade: 'befriedigend', comment: 'nachgereicht' });

    const same = await request(app).put(url).send({ raw_score: 12.5, comment: 'nachgereicht' });
    expect(same.status).toBe(200);
    expect(same.body.change).toBe('unchanged');

    expect((await request(app).delete(url)).status).toBe(204);
    const gone = await request(app).delete(url);
    expect(gone.status).toBe(404);
    expect(gone.body.error.code).toBe('NOT_FOUND');
  });

  it('archiving blocks writes and keeps the assessment from being deleted', async () => {
    const { assessmentId } = await createFixture();
    await request(app).put(`/api/v1/assessments/${assessmentId}/results/stud_2`).send({ raw_score: 18 });

    const archived = await request(app).post(`/api/v1/assessments/${assessmentId}/archive`);
    expect(archived.status).toBe(200);
    expect(archived.body.data.archived_at).not.toBeNull();

    const write = await request(app).put(`/api/v1/assessments/${assessmentId}/results/stud_1`).send({ raw_score: 10 });
    expect(write.status).toBe(409);
    expect(write.body.error.code).toBe('ASSESSMENT_ARCHIVED');

    const del = await request(app).delete(`/api/v1/assessments/${assessmentId}`);
    expect(del.status).toBe(409);
    expect(del.body.error.code).toBe('ASSESSMENT_HAS_RESULTS');

    const active = await request(app).get('/api/v1/assessments');
    expect(active.body.data).toEqual([]);
    const all = await request(app).get('/api/v1/assessments?include_archived=true');
    expect(all.body.data).toHaveLength(1);
  });

  it('GET /api/v1/changes pages newest first', async () => {
    const { assessmentId } = await createFixture();
    await request(app).put(`/api/v1/assessments/${assessmentId}/results/stud_1`).send({ raw_score: 15 });

    const first = await request(app).get('/api/v1/changes?limit=2');
    expect(first.status).toBe(200);
    expect(first.body.data.map((c: { entity: string }) => c.entity)).toEqual(['result', 'assessment']);
    expect(first.body.pagination).toMatchObject({ has_more: true, total_count: 3 });

    const second = await request(app).get(`/api/v1/changes?limit=2&cursor=${encodeURIComponent(first.body.pagination.next_cursor)}`);
    expect(second.body.data.map((c: { entity: string }) => c.entity)).toEqual(['grade_key']);
    expect(second.body.pagination).toMatchObject({ has_more: false, next_cursor: null });
  });

  it('answers malformed JSON with 400', async () => {
    const res = await request(app)
      .post('/api/v1/grade-keys')
      .set('Content-Type', 'application/json')
      .send('{"name":');
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('ENTITY_PARSE_FAILED');
  });
});
