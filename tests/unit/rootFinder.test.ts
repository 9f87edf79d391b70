import { describe, it, expect } from 'vitest';
import { findRoot, RootFindingError, DEFAULT_ROOT_FINDER_OPTIONS } from '@core/math';

describe('findRoot', () => {
  it('should find a root inside the bracket', () => {
    const { root } = findRoot(x => x * x - 2, [0, 2]);
    expect(root).toBeCloseTo(Math.SQRT2, 8);
  });

  it('should stop as soon as the midpoint is an exact root', () => {
    expect(findRoot(x => x - 1, [0, 2])).toEqual({ root: 1, iterations: 1 });
  });

  it('should return a bracket end that is already a root', () => {
    expect(findRoot(x => x - 1, [1, 3])).toEqual({ root: 1, iterations: 0 });
    expect(findRoot(x => x - 3, [1, 3])).toEqual({ root: 3, iterations: 0 });
  });

  it('should work on decreasing functions', () => {
    const { root } = findRoot(x => 10 - x, [0, 100]);
    expect(root).toBeCloseTo(10, 8);
  });

  it('should be deterministic', () => {
    const f = (x: number) => Math.cos(x) - x;
    expect(findRoot(f, [0, 1])).toEqual(findRoot(f, [0, 1]));
  });

  it('should honour the tolerance', () => {
    const coarse = findRoot(x => x * x - 2, [0, 2], { tolerance: 1e-2 });
    const fine = findRoot(x => x * x - 2, [0, 2]);
    expect(Math.abs(coarse.root - Math.SQRT2)).toBeLessThan(2e-2);
    expect(coarse.iterations).toBeLessThan(fine.iterations);
  });

  it('should reject a bracket without a sign change', () => {
    try {
      findRoot(x => x * x + 1, [-1, 1]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RootFindingError);
      if (error instanceof RootFindingError) {
        expect(error.reason).toBe('not-bracketed');
        expect(error.bracket).toEqual([-1, 1]);
      }
    }
  });

  it('should reject non-finite end values', () => {
    expect(() => findRoot(() => Number.NaN, [0, 1])).toThrow(RootFindingError);
  });

  it('should give up after the iteration budget', () => {
    try {
      findRoot(x => x * x - 2, [0, 2], { maxIterations: 3 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RootFindingError);
      if (error instanceof RootFindingError) {
        expect(error.reason).toBe('no-convergence');
      }
    }
  });

  it('should expose its defaults', () => {
    expect(DEFAULT_ROOT_FINDER_OPTIONS).toEqual({ tolerance: 1e-9, maxIterations: 200 });
  });
});
