import { describe, expect, it } from 'vitest';

import { ConfigValidationError } from '../src/core/errors';
import { DEFAULT_WEIGHTS } from '../src/ai/evaluator';
import { compareWeightSets, WEIGHT_PRESETS } from '../src/training/tuning';

describe('compareWeightSets', () => {
  it('measures identical weight sets identically and keeps their order', () => {
    const results = compareWeightSets(
      [
        { name: 'first', weights: {} },
        { name: 'second', weights: { ...DEFAULT_WEIGHTS } },
      ],
      2,
      { seed: 7, maxMoves: 40 },
    );

    expect(results.map((result) => result.name)).toEqual(['first', 'second']);
    expect(results.map((result) => result.rank)).toEqual([1, 2]);
    const [first, second] = results;
    expect(first?.averageScore).toBe(second?.averageScore);
    expect(first?.averageEfficiency).toBe(second?.averageEfficiency);
    expect(first?.averageEfficiency).toBeGreaterThan(0);
    expect(first?.weights).toEqual(DEFAULT_WEIGHTS);
    expect(first?.games).toBe(2);
    expect(results.map((result) => result.improvementPercent)).toEqual([0, 0]);
  });

  it('gives the same ranking for the same seed', () => {
    const a = compareWeightSets(WEIGHT_PRESETS, 2, { seed: 3, maxMoves: 60 });
    const b = compareWeightSets(WEIGHT_PRESETS, 2, { seed: 3, maxMoves: 60 });
    expect(b).toEqual(a);
  });

  it('orders the presets by efficiency against the baseline', () => {
    const results = compareWeightSets(WEIGHT_PRESETS, 2, { seed: 1, maxMoves: 60 });

    expect(results).toHaveLength(WEIGHT_PRESETS.length);
    expect([...results.map((result) => result.name)].sort()).toEqual(
      WEIGHT_PRESETS.map((preset) => preset.name).sort(),
    );
    for (let i = 1; i < results.length; i += 1) {
      expect(results[i - 1]?.averageEfficiency ?? 0).toBeGreaterThanOrEqual(results[i]?.averageEfficiency ?? 0);
    }
    expect(results.map((result) => result.rank)).toEqual([1, 2, 3, 4, 5]);
    expect(results.find((result) => result.name === 'baseline')?.improvementPercent).toBe(0);
  });

  it('measures improvement against a named baseline', () => {
    const results = compareWeightSets(WEIGHT_PRESETS, 1, { seed: 2, maxMoves: 30, baseline: 'merge_focused' });
    const reference = results.find((result) => result.name === 'merge_focused');
    expect(reference?.improvementPercent).toBe(0);
    const best = results[0];
    if (best && reference) {
      expect(best.improvementPercent).toBeCloseTo(
        ((best.averageEfficiency - reference.averageEfficiency) / reference.averageEfficiency) * 100,
      );
    }
  });

  it('rejects invalid comparisons', () => {
    const sets = [{ name: 'only', weights: {} }];
    expect(() => compareWeightSets(sets, 0)).toThrow(ConfigValidationError);
    expect(() => compareWeightSets(sets, 1.5)).toThrow(ConfigValidationError);
    expect(() => compareWeightSets([...sets, ...sets], 1)).toThrow(ConfigValidationError);
    expect(() => compareWeightSets(sets, 1, { baseline: 'missing' })).toThrow(ConfigValidationError);
    expect(() =>
      compareWeightSets([{ name: 'broken', weights: { corner_bonus: Number.POSITIVE_INFINITY } }], 1),
    ).toThrow(ConfigValidationError);
  });
});
