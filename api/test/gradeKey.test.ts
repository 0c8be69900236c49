import { describe, it, expect } from 'vitest';
import {
  DEFAULT_GRADE_KEY_DEFINITION,
  DEFAULT_GRADE_KEY_NAME,
  seedDefaultGradeKey,
} from '../src/db/migrate';
import {
  GradeKeyInUseError,
  InvalidRangeError,
  DuplicateNameError,
  NotFoundError,
  OutOfRangeError,
  ValidationError,
} from '../src/errors';
import {
  createGradeKey,
  deleteGradeKey,
  getGradeKey,
  normalizeScore,
  parseBandDefinition,
  readBands,
  resolveGrade,
  updateGradeKeyBands,
  validateBands,
} from '../src/services/gradeKeyService';
import { recordManualResult } from '../src/services/resultService';
import type { GradeKey } from '../src/types';
import { STANDARD_BANDS, makeContext, setupAssessment } from './helpers';

function key(bands = STANDARD_BANDS, domainMax = 1): GradeKey {
  return {
    id: 'key-1',
    name: 'standard',
    domain_max: domainMax,
    bands: validateBands(bands, domainMax),
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
  };
}

describe('validateBands', () => {
  it('returns bands sorted by lower bound', () => {
    const shuffled = [STANDARD_BANDS[2], STANDARD_BANDS[0], STANDARD_BANDS[1]];
    expect(validateBands(shuffled, 1).map((b) => b.label)).toEqual(['nicht bestanden', 'befriedigend', 'gut']);
  });

  it('rejects a gap between bands', () => {
    expect(() => validateBands([
      { lower_bound: 0, upper_bound: 0.5, label: 'a' },
      { lower_bound: 0.6, upper_bound: 1, label: 'b' },
    ], 1)).toThrow('Gap between 0.5 and 0.6');
  });

  it('rejects overlapping bands', () => {
    expect(() => validateBands([
      { lower_bound: 0, upper_bound: 0.6, label: 'a' },
      { lower_bound: 0.5, upper_bound: 1, label: 'b' },
    ], 1)).toThrow('Bands "a" and "b" overlap');
  });

  it('allows only the last band to be open-ended', () => {
    expect(() => validateBands([
      { lower_bound: 0, upper_bound: null, label: 'a' },
      { lower_bound: 0.5, upper_bound: 1, label: 'b' },
    ], 1)).toThrow('Only the last band may be open-ended, not "a"');
  });

  it('requires coverage from 0 to the domain maximum', () => {
    expect(() => validateBands([{ lower_bound: 0.1, upper_bound: 1, label: 'a' }], 1))
      .toThrow('First band must start at 0, starts at 0.1');
    expect(() => validateBands([{ lower_bound: 0, upper_bound: 0.9, label: 'a' }], 1))
      .toThrow('Gap between 0.9 and 1');
    expect(() => validateBands([{ lower_bound: 0, upper_bound: 1.5, label: 'a' }], 1))
      .toThrow('Last band ends at 1.5, beyond 1');
  });

  it('rejects empty and inverted bands', () => {
    expect(() => validateBands([], 1)).toThrow(InvalidRangeError);
    expect(() => validateBands([
      { lower_bound: 0, upper_bound: 0, label: 'a' },
      { lower_bound: 0, upper_bound: 1, label: 'b' },
    ], 1)).toThrow('Band "a" is empty: 0..0');
  });

  it('rejects a blank label as a validation error', () => {
    expect(() => validateBands([{ lower_bound: 0, upper_bound: 1, label: '  ' }], 1))
      .toThrow('Band 1 has an empty label');
    expect(() => validateBands([{ lower_bound: 0, upper_bound: 1, label: '' }], 1)).toThrow(ValidationError);
  });
});

describe('resolveGrade', () => {
  const standard = key();

  it('maps raw scores through the normalized fraction', () => {
    expect(resolveGrade(standard, 15, 20)).toBe('gut');
    expect(resolveGrade(standard, 11.9, 20)).toBe('nicht bestanden');
    expect(resolveGrade(standard, 12, 20)).toBe('befriedigend');
    expect(resolveGrade(standard, 0, 20)).toBe('nicht bestanden');
  });

  it('includes the upper bound of the last band only', () => {
    expect(resolveGrade(standard, 20, 20)).toBe('gut');
  });

  it('throws OutOfRangeError above a closed key', () => {
    expect(() => resolveGrade(standard, 21, 20)).toThrow(OutOfRangeError);
  });

  it('accepts anything above the last lower bound of an open-ended key', () => {
    const open = key([
      { lower_bound: 0, upper_bound: 50, label: 'fail' },
      { lower_bound: 50, upper_bound: null, label: 'pass' },
    ], 100);
    expect(resolveGrade(open, 30, 20)).toBe('pass');
    expect(resolveGrade(open, 9, 20)).toBe('fail');
  });

  it('grades with the seeded percentage key', () => {
    const percent = key(parseBandDefinition(DEFAULT_GRADE_KEY_DEFINITION), 100);
    expect(resolveGrade(percent, 15, 20)).toBe('2.5');
    expect(resolveGrade(percent, 20, 20)).toBe('1.0');
    expect(resolveGrade(percent, 11.9, 20)).toBe('3.5');
    expect(resolveGrade(percent, 0, 20)).toBe('6.0');
  });
});

describe('resolveGrade at band boundaries', () => {
  const MAX_SCORES = [1, 3, 7, 20, 30, 37, 45, 60, 100];

  function sweep(gradeKey: GradeKey): void {
    for (const maxScore of MAX_SCORES) {
      gradeKey.bands.forEach((band, i) => {
        const atLower = (band.lower_bound * maxScore) / gradeKey.domain_max;
        expect(resolveGrade(gradeKey, atLower, maxScore), `${atLower}/${maxScore}`).toBe(band.label);

        if (band.upper_bound !== null) {
          const mid = (((band.lower_bound + band.upper_bound) / 2) * maxScore) / gradeKey.domain_max;
          expect(resolveGrade(gradeKey, mid, maxScore), `${mid}/${maxScore}`).toBe(band.label);
        }
        if (i > 0) {
          const below = atLower - maxScore / (gradeKey.domain_max * 1e6);
          expect(resolveGrade(gradeKey, below, maxScore), `${below}/${maxScore}`).toBe(gradeKey.bands[i - 1].label);
        }
      });
    }
  }

  it('puts a lower bound into its own band on the fraction key', () => {
    sweep(key());
  });

  it('puts a lower bound into its own band on the percentage key', () => {
    sweep(key(parseBandDefinition(DEFAULT_GRADE_KEY_DEFINITION), 100));
  });

  it('grades typed decimals that hit a boundary exactly', () => {
    const percent = key(parseBandDefinition(DEFAULT_GRADE_KEY_DEFINITION), 100);
    expect(resolveGrade(percent, 17.4, 30)).toBe('3.5');
    expect(resolveGrade(percent, 0.58, 1)).toBe('3.5');
    expect(resolveGrade(percent, 6.3, 20)).toBe('5.0');
    expect(normalizeScore(17.4, 30, 100)).toBe(58);
  });
});

describe('parseBandDefinition', () => {
  it('reads label;lower;upper lines with decimal commas and blank lines', () => {
    expect(parseBandDefinition('gut;0,75;1\n\nnicht bestanden;0;0.6\r\nbefriedigend;0.6;0.75')).toEqual([
      { label: 'gut', lower_bound: 0.75, upper_bound: 1 },
      { label: 'nicht bestanden', lower_bound: 0, upper_bound: 0.6 },
      { label: 'befriedigend', lower_bound: 0.6, upper_bound: 0.75 },
    ]);
  });

  it('treats * and an empty upper bound as open-ended', () => {
    expect(parseBandDefinition('a;0;50\nb;50;*')[1].upper_bound).toBeNull();
    expect(parseBandDefinition('a;0;50\nb;50;')[1].upper_bound).toBeNull();
  });

  it('names the offending line', () => {
    expect(() => parseBandDefinition('a;0')).toThrow('Line 1: expected "label;lower;upper"');
    expect(() => parseBandDefinition('a;0;1\nb;abc;2')).toThrow('Line 2: invalid lower bound "abc"');
  });
});

describe('readBands', () => {
  it('defaults a missing upper bound to null', () => {
    expect(readBands([{ label: 'x', lower_bound: 0 }])).toEqual([{ label: 'x', lower_bound: 0, upper_bound: null }]);
  });

  it('rejects non-numeric bounds', () => {
    expect(() => readBands([{ label: 'x', lower_bound: '0' }])).toThrow('bands[0].lower_bound must be a number');
    expect(() => readBands('nope')).toThrow('bands must be an array');
  });
});

describe('grade key lifecycle', () => {
  it('rejects a duplicate name', async () => {
    const { ctx } = makeContext();
    await createGradeKey(ctx, 'standard', STANDARD_BANDS);
    await expect(createGradeKey(ctx, ' standard ', STANDARD_BANDS)).rejects.toThrow(DuplicateNameError);
  });

  it('allows band edits until a result is graded with the key', async () => {
    const { ctx } = makeContext();
    const { gradeKey, assessment } = await setupAssessment(ctx);

    const edited = await updateGradeKeyBands(ctx, gradeKey.id, [
      { lower_bound: 0, upper_bound: 0.5, label: 'nicht bestanden' },
      { lower_bound: 0.5, upper_bound: 1, label: 'bestanden' },
    ]);
    expect(edited.bands).toHaveLength(2);

    await recordManualResult(ctx, assessment.id, 'stud_1', 10, null);
    await expect(updateGradeKeyBands(ctx, gradeKey.id, STANDARD_BANDS)).rejects.toThrow(GradeKeyInUseError);
  });

  it('refuses to delete a key an assessment refers to', async () => {
    const { ctx } = makeContext();
    const { gradeKey } = await setupAssessment(ctx);
    await expect(deleteGradeKey(ctx, gradeKey.id)).rejects.toThrow(GradeKeyInUseError);

    const spare = await createGradeKey(ctx, 'spare', STANDARD_BANDS);
    await deleteGradeKey(ctx, spare.id);
    await expect(getGradeKey(ctx, spare.id)).rejects.toThrow(NotFoundError);
  });

  it('seeds the default key only into an empty store', async () => {
    const { ctx, store } = makeContext();
    expect(await seedDefaultGradeKey(ctx)).toBe(true);
    expect(await seedDefaultGradeKey(ctx)).toBe(false);

    const keys = await store.listGradeKeys();
    expect(keys).toHaveLength(1);
    expect(keys[0].name).toBe(DEFAULT_GRADE_KEY_NAME);
    expect(keys[0].domain_max).toBe(100);
    expect(keys[0].bands[0]).toEqual({ label: '6.0', lower_bound: 0, upper_bound: 19 });
    expect(keys[0].bands[10]).toEqual({ label: '1.0', lower_bound: 93, upper_bound: 100 });
  });
});
