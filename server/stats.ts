export type RandomSource = () => number;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Uniform float in [min, max). */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

/** Uniform integer in [min, max). */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return Math.min(max - 1, min + Math.floor(random() * (max - min)));
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  const item = items[randomInt(random, 0, items.length)];
  if (item === undefined) {
    throw new RangeError("Cannot pick from an empty list");
  }
  return item;
}
