/** A source of uniformly distributed numbers in [0, 1). `Math.random` is one. */
export type Rng = () => number;

/**
 * Small seedable generator (mulberry32). Used by tests and anywhere a
 * reproducible simulated series is wanted.
 */
export function createSeededRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

export const uniform = (rng: Rng, min: number, max: number) => min + rng() * (max - min);

/** Normally distributed sample via the Box–Muller transform. */
export function normal(rng: Rng, mean: number, sd: number): number {
  // 1 - rng() keeps the log argument in (0, 1]
  const u1 = 1 - rng();
  const u2 = rng();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * sd;
}

/**
 * Apply deterministic sinusoidal variation around a baseline value.
 * Produces realistic-looking time-series data without randomness.
 *
 * @param base      Centre value to oscillate around
 * @param stepIndex Current time-step index (0 … N)
 * @param amplitude Maximum deviation from the base
 */
export const applyVariation = (base: number, stepIndex: number, amplitude: number) =>
  Math.round((base + Math.sin(stepIndex * 0.9) * amplitude + Math.cos(stepIndex * 0.5) * amplitude * 0.4) * 100) / 100;

export const round = (value: number, digits = 1) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};
