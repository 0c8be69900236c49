import {
  DuplicateNameError,
  GradeKeyInUseError,
  InvalidRangeError,
  NotFoundError,
  OutOfRangeError,
  ValidationError,
} from '../errors';
import type { GradeBand, GradeKey } from '../types';
import { parseDecimal } from '../utils/numbers';
import { recordChange } from './changeLog';
import type { ServiceContext } from './context';

export const FRACTION_DOMAIN = 1;

/**
 * Checks that bands partition [0, domainMax] and returns them sorted by
 * lower bound. Only the last band may leave its upper bound open.
 */
export function validateBands(bands: GradeBand[], domainMax: number): GradeBand[] {
  if (!Number.isFinite(domainMax) || domainMax <= 0) {
    throw new InvalidRangeError(`domain_max must be a positive number, got ${domainMax}`);
  }
  if (bands.length === 0) {
    throw new InvalidRangeError('A grade key needs at least one band');
  }

  const sorted = bands
    .map((b) => ({ lower_bound: b.lower_bound, upper_bound: b.upper_bound, label: b.label.trim() }))
    .sort((a, b) => a.lower_bound - b.lower_bound);

  for (const [i, band] of sorted.entries()) {
    const isLast = i === sorted.length - 1;
    if (!band.label) {
      throw new ValidationError(`Band ${i + 1} has an empty label`);
    }
    if (!Number.isFinite(band.lower_bound)) {
      throw new InvalidRangeError(`Band "${band.label}" has a non-numeric lower bound`);
    }
    if (band.upper_bound === null) {
      if (!isLast) {
        throw new InvalidRangeError(`Only the last band may be open-ended, not "${band.label}"`);
      }
      continue;
    }
    if (!Number.isFinite(band.upper_bound)) {
      throw new InvalidRangeError(`Band "${band.label}" has a non-numeric upper bound`);
    }
    if (band.upper_bound <= band.lower_bound) {
      throw new InvalidRangeError(`Band "${band.label}" is empty: ${band.lower_bound}..${band.upper_bound}`);
    }
    if (!isLast) {
      const next = sorted[i + 1];
      if (next.lower_bound > band.upper_bound) {
        throw new InvalidRangeError(`Gap between ${band.upper_bound} and ${next.lower_bound}`);
      }
      if (next.lower_bound < band.upper_bound) {
        throw new InvalidRangeError(`Bands "${band.label}" and "${next.label}" overlap`);
      }
    }
  }

  if (sorted[0].lower_bound !== 0) {
    throw new InvalidRangeError(`First band must start at 0, starts at ${sorted[0].lower_bound}`);
  }
  const last = sorted[sorted.length - 1];
  if (last.upper_bound !== null && last.upper_bound < domainMax) {
    throw new InvalidRangeError(`Gap between ${last.upper_bound} and ${domainMax}`);
  }
  if (last.upper_bound !== null && last.upper_bound > domainMax) {
    throw new InvalidRangeError(`Last band ends at ${last.upper_bound}, beyond ${domainMax}`);
  }

  return sorted;
}

/** Closed-lower, open-upper lookup; the last band also includes its upper bound. */
export function findBand(bands: GradeBand[], value: number): GradeBand | null {
  let lo = 0;
  let hi = bands.length - 1;
  let idx = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (bands[mid].lower_bound <= value) {
      idx = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  if (idx === -1) return null;

  const band = bands[idx];
  if (band.upper_bound === null || value < band.upper_bound) return band;
  if (idx === bands.length - 1 && value === band.upper_bound) return band;
  return null;
}

// float noise below 1e-9 is dropped before band lookup
const NORMALIZED_PRECISION = 1e9;

export function normalizeScore(rawScore: number, maxScore: number, domainMax: number): number {
  const value = (rawScore * domainMax) / maxScore;
  return Math.round(value * NORMALIZED_PRECISION) / NORMALIZED_PRECISION;
}

export function resolveGrade(key: GradeKey, rawScore: number, maxScore: number): string {
  if (!(maxScore > 0) || !Number.isFinite(rawScore)) {
    throw new OutOfRangeError(rawScore, key.name);
  }
  const value = normalizeScore(rawScore, maxScore, key.domain_max);
  const band = findBand(key.bands, value);
  if (!band) {
    throw new OutOfRangeError(value, key.name);
  }
  return band.label;
}

/**
 * Reads the text form of a grade key: one `label;lower;upper` line per band,
 * in any order. `*` or an empty upper bound marks the open-ended last band.
 */
export function parseBandDefinition(text: string): GradeBand[] {
  const bands: GradeBand[] = [];
  for (const [i, line] of text.split(/\r?\n/).entries()) {
    if (!line.trim()) continue;
    const parts = line.split(';').map((p) => p.trim());
    if (parts.length !== 3) {
      throw new ValidationError(`Line ${i + 1}: expected "label;lower;upper"`);
    }
    const [label, lowerRaw, upperRaw] = parts;
    const lower = parseDecimal(lowerRaw);
    if (lower === null) {
      throw new ValidationError(`Line ${i + 1}: invalid lower bound "${lowerRaw}"`);
    }
    let upper: number | null = null;
    if (upperRaw !== '' && upperRaw !== '*') {
      upper = parseDecimal(upperRaw);
      if (upper === null) {
        throw new ValidationError(`Line ${i + 1}: invalid upper bound "${upperRaw}"`);
      }
    }
    bands.push({ label, lower_bound: lower, upper_bound: upper });
  }
  return bands;
}

/** Shape check for bands arriving as JSON. */
export function readBands(value: unknown): GradeBand[] {
  if (!Array.isArray(value)) {
    throw new ValidationError('bands must be an array');
  }
  return value.map((item: unknown, i) => {
    if (typeof item !== 'object' || item === null) {
      throw new ValidationError(`bands[${i}] must be an object`);
    }
    const lower = 'lower_bound' in item ? item.lower_bound : undefined;
    const upper = 'upper_bound' in item ? item.upper_bound : null;
    const label = 'label' in item ? item.label : undefined;
    if (typeof label !== 'string') {
      throw new ValidationError(`bands[${i}].label must be a string`);
    }
    if (typeof lower !== 'number') {
      throw new ValidationError(`bands[${i}].lower_bound must be a number`);
    }
    if (upper !== null && upper !== undefined && typeof upper !== 'number') {
      throw new ValidationError(`bands[${i}].upper_bound must be a number or null`);
    }
    return { label, lower_bound: lower, upper_bound: typeof upper === 'number' ? upper : null };
  });
}

export async function createGradeKey(
  ctx: ServiceContext,
  name: string,
  bands: GradeBand[],
  domainMax: number = FRACTION_DOMAIN,
): Promise<GradeKey> {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError('name is required');
  }
  const sorted = validateBands(bands, domainMax);
  if (await ctx.store.findGradeKeyByName(trimmed)) {
    throw new DuplicateNameError(trimmed);
  }

  const key = await ctx.store.insertGradeKey({ name: trimmed, domain_max: domainMax, bands: sorted });
  await recordChange(ctx, { action: 'create', entity: 'grade_key', recordId: key.id, newValue: key.name });
  ctx.logger.info({
    module: 'services.gradeKey',
    grade_key_id: key.id,
    name: key.name,
    band_count: key.bands.length,
  }, 'Grade key created');
  return key;
}

export async function getGradeKey(ctx: ServiceContext, id: string): Promise<GradeKey> {
  const key = await ctx.store.getGradeKey(id);
  if (!key) throw new NotFoundError('Grade key', id);
  return key;
}

export async function listGradeKeys(ctx: ServiceContext): Promise<GradeKey[]> {
  return ctx.store.listGradeKeys();
}

export async function updateGradeKeyBands(ctx: ServiceContext, id: string, bands: GradeBand[]): Promise<GradeKey> {
  const key = await getGradeKey(ctx, id);
  const sorted = validateBands(bands, key.domain_max);
  const users = (await ctx.store.listAssessments(true)).filter((a) => a.grade_key_id === id);

  // every assessment grading with this key stays locked until the new bands are stored
  return ctx.locks.withLocks(users.map((a) => a.id), async () => {
    const resultCount = await ctx.store.countResultsForGradeKey(id);
    if (resultCount > 0) {
      throw new GradeKeyInUseError(id, `${resultCount} results were graded with it`);
    }

    const updated = await ctx.store.updateGradeKeyBands(id, sorted);
    if (!updated) throw new NotFoundError('Grade key', id);
    await recordChange(ctx, {
      action: 'update',
      entity: 'grade_key',
      recordId: id,
      fieldName: 'bands',
      oldValue: JSON.stringify(key.bands),
      newValue: JSON.stringify(updated.bands),
    });
    ctx.logger.info({ module: 'services.gradeKey', grade_key_id: id, band_count: sorted.length }, 'Grade key updated');
    return updated;
  });
}

export async function deleteGradeKey(ctx: ServiceContext, id: string): Promise<void> {
  const key = await getGradeKey(ctx, id);
  const assessmentCount = await ctx.store.countAssessmentsForGradeKey(id);
  if (assessmentCount > 0) {
    throw new GradeKeyInUseError(id, `referenced by ${assessmentCount} assessments`);
  }
  await ctx.store.deleteGradeKey(id);
  await recordChange(ctx, { action: 'delete', entity: 'grade_key', recordId: id, oldValue: key.name });
  ctx.logger.info({ module: 'services.gradeKey', grade_key_id: id, name: key.name }, 'Grade key deleted');
}
