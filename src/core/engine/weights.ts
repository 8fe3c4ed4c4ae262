// Nice -> weight table. Built once at module load, read-only afterwards.

import { InvalidConfigurationError } from "./errors";

export const MIN_NICE = -20;
export const MAX_NICE = 19;
export const NICE_0_WEIGHT = 1024;
// Each nice step changes the CPU share by ~25%.
export const WEIGHT_RATIO = 1.25;

const WEIGHTS: readonly number[] = Object.freeze(
  Array.from({ length: MAX_NICE - MIN_NICE + 1 }, (_, i) =>
    Math.round(NICE_0_WEIGHT / Math.pow(WEIGHT_RATIO, MIN_NICE + i))
  )
);

export function isValidNice(nice: number): boolean {
  return Number.isInteger(nice) && nice >= MIN_NICE && nice <= MAX_NICE;
}

export function weightOf(nice: number): number {
  if (!isValidNice(nice)) {
    throw new InvalidConfigurationError(
      "out_of_range",
      `nice ${nice} outside [${MIN_NICE}, ${MAX_NICE}]`
    );
  }
  return WEIGHTS[nice - MIN_NICE];
}

export function weightTable(): readonly number[] {
  return WEIGHTS;
}
