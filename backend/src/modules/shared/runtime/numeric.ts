export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/** Uniform value in [min, max) drawn from the given source. */
export function jitter(min: number, max: number, random: () => number): number {
  return min + random() * (max - min);
}

/** Uniform integer in [0, n). */
export function randomInt(n: number, random: () => number): number {
  return Math.min(n - 1, Math.floor(random() * n));
}
