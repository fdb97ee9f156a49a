import { randomInt } from "node:crypto";
import type { RandomSource } from "./types";

const RESOLUTION = 2 ** 48;

/** Backed by node:crypto; use this for anything that ends up in a password. */
export const cryptoRandom: RandomSource = () => randomInt(RESOLUTION) / RESOLUTION;

export const mathRandom: RandomSource = () => Math.random();

/** Replays `values` in a loop. Intended for reproducible runs and tests. */
export function sequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) throw new RangeError("sequenceRandom needs at least one value");
  let i = 0;
  return () => {
    const v = values[i % values.length];
    i += 1;
    return v;
  };
}

export function unitSample(rng: RandomSource): number {
  const r = rng();
  if (!(r >= 0 && r < 1)) throw new RangeError(`random source returned ${r}, expected a value in [0, 1)`);
  return r;
}

export function randomIndex(rng: RandomSource, size: number): number {
  return Math.floor(unitSample(rng) * size);
}
