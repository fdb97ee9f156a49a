import { randomIndex } from "./random";
import type { ComplexityPolicy, RandomSource } from "./types";

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

function replaceAt(word: string, index: number, ch: string): string {
  return word.slice(0, index) + ch + word.slice(index + 1);
}

// Positions are drawn independently, so a digit may land on a capital.
export function applyComplexity(word: string, policy: ComplexityPolicy, rng: RandomSource): string {
  assertCount("capitals", policy.capitals);
  assertCount("digits", policy.digits);
  if (!word.length) return word;

  let out = word;
  for (let i = 0; i < policy.capitals; i++) {
    const index = randomIndex(rng, out.length);
    out = replaceAt(out, index, out[index].toUpperCase());
  }
  for (let i = 0; i < policy.digits; i++) {
    const index = randomIndex(rng, out.length);
    const digit = randomIndex(rng, 10);
    out = replaceAt(out, index, String(digit));
  }
  return out;
}
