import { describe, expect, it } from 'vitest';
import { applyVariation, clamp, createSeededRng, normal, round, uniform } from './random';

describe('createSeededRng', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createSeededRng(42);
    const b = createSeededRng(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('stays within [0, 1)', () => {
    const rng = createSeededRng(7);
    for (let i = 0; i < 1000; i++) {
      const value = rng();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('helpers', () => {
  it('clamps', () => {
    expect(clamp(-1, 0, 10)).toBe(0);
    expect(clamp(11, 0, 10)).toBe(10);
    expect(clamp(5, 0, 10)).toBe(5);
  });

  it('scales uniform samples to the range', () => {
    expect(uniform(() => 0.5, 10, 20)).toBe(15);
    expect(uniform(() => 0, 0.9, 1.1)).toBe(0.9);
  });

  it('returns the mean when the normal deviate is zero', () => {
    // u2 = 0.25 puts cos(2πu2) at zero
    const values = [0.5, 0.25];
    const rng = () => values.shift() ?? 0;
    expect(normal(rng, 5, 2)).toBeCloseTo(5, 10);
  });

  it('applies the sinusoidal variation', () => {
    expect(applyVariation(30, 0, 2)).toBe(30.8);
  });

  it('rounds to the requested digits', () => {
    expect(round(3.14159)).toBe(3.1);
    expect(round(3.14159, 2)).toBe(3.14);
    expect(round(2.5, 0)).toBe(3);
  });
});
