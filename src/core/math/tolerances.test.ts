import { describe, it, expect } from 'vitest';
import { DEFAULT_TOLERANCES, resolveTolerances } from './tolerances';
import { degrees } from './angle';
import { fromAxis, gimbalPole } from './quaternion';

describe('resolveTolerances', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveTolerances()).toEqual(DEFAULT_TOLERANCES);
  });

  it('overrides only the given fields', () => {
    expect(resolveTolerances({ gimbalThreshold: 0.45 })).toEqual({
      ...DEFAULT_TOLERANCES,
      gimbalThreshold: 0.45,
    });
  });

  it('leaves the defaults untouched', () => {
    resolveTolerances({ epsilon: 0.5 });
    expect(DEFAULT_TOLERANCES.epsilon).toBe(1e-6);
  });

  it('refuses writes to the shared defaults', () => {
    expect(Object.isFrozen(DEFAULT_TOLERANCES)).toBe(true);
    expect(Reflect.set(DEFAULT_TOLERANCES, 'epsilon', 0.5)).toBe(false);
    expect(resolveTolerances().epsilon).toBe(1e-6);
  });

  it('widens the gimbal band when the threshold drops', () => {
    // 80 degrees of pitch: w*x = sin(80°)/2 ≈ 0.492
    const q = fromAxis(degrees(80), [1, 0, 0]);
    expect(gimbalPole(q)).toBe('none');
    expect(gimbalPole(q, { gimbalThreshold: 0.45 })).toBe('north');
  });
});
