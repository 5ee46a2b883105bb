import { describe, expect, it } from 'vitest';

import { isServiceError } from '@skillrank/common';

import { DEFAULT_WEIGHTS, normalizeWeights, resolveWeights } from '../signal-weights';
import { createCapturingLogger, WARN_LEVEL } from './test-logger';

describe('normalizeWeights', () => {
  it('returns weights that already sum to 1 unchanged', () => {
    const { logger, lines } = createCapturingLogger();

    expect(normalizeWeights({ skillMatch: 0.4, semanticSimilarity: 0.4, experience: 0.2 }, logger)).toEqual({
      skillMatch: 0.4,
      semanticSimilarity: 0.4,
      experience: 0.2
    });
    expect(lines).toHaveLength(0);
  });

  it('rescales and warns otherwise', () => {
    const { logger, lines } = createCapturingLogger();

    const weights = normalizeWeights({ skillMatch: 2, semanticSimilarity: 1, experience: 1 }, logger);

    expect(weights).toEqual({ skillMatch: 0.5, semanticSimilarity: 0.25, experience: 0.25 });
    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe(WARN_LEVEL);
    expect(lines[0].sum).toBe(4);
  });

  it('rejects a zero sum', () => {
    let caught: unknown;
    try {
      normalizeWeights({ skillMatch: 0, semanticSimilarity: 0, experience: 0 });
    } catch (error) {
      caught = error;
    }

    expect(isServiceError(caught, 'invalid_argument')).toBe(true);
  });

  it('rejects negative and non-finite weights', () => {
    expect(() => normalizeWeights({ skillMatch: -0.1, semanticSimilarity: 0.6, experience: 0.5 })).toThrow(
      /non-negative/
    );
    expect(() => normalizeWeights({ skillMatch: Number.NaN, semanticSimilarity: 0.6, experience: 0.4 })).toThrow(
      /finite/
    );
  });

  it('rejects weights whose sum overflows', () => {
    expect(() => normalizeWeights({ skillMatch: 1e308, semanticSimilarity: 1e308, experience: 0 })).toThrow(
      'Scoring weights must have a finite sum'
    );
  });
});

describe('resolveWeights', () => {
  it('uses the base weights without overrides', () => {
    expect(resolveWeights(undefined)).toEqual(DEFAULT_WEIGHTS);
  });

  it('merges overrides and renormalizes', () => {
    const { logger } = createCapturingLogger();
    const weights = resolveWeights({ experience: 0 }, DEFAULT_WEIGHTS, logger);

    expect(weights.skillMatch).toBeCloseTo(0.5, 10);
    expect(weights.semanticSimilarity).toBeCloseTo(0.5, 10);
    expect(weights.experience).toBe(0);
  });
});
