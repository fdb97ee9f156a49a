import { GenerationExhaustedError } from "./errors";
import { generate, isKnownWord } from "./generator";
import type { Model, RandomSource } from "./types";

export const DEFAULT_MAX_ATTEMPTS = 10;

export type GenerationResult =
  | { ok: true; word: string; attempts: number }
  | { ok: false; error: GenerationExhaustedError; attempts: number };

/**
 * Samples until the output is not in the training set, at most `maxAttempts` times.
 * Transition errors from the generator are thrown, not folded into the result.
 */
export function generateUnknownWord(
  model: Model,
  length: number,
  rng: RandomSource,
  maxAttempts = DEFAULT_MAX_ATTEMPTS
): GenerationResult {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const word = generate(model.table, model.order, length, rng);
    if (!isKnownWord(model.trainingSet, word)) return { ok: true, word, attempts: attempt };
  }
  return { ok: false, error: new GenerationExhaustedError(maxAttempts), attempts: maxAttempts };
}

export function unwrapGeneration(result: GenerationResult): string {
  if (!result.ok) throw result.error;
  return result.word;
}
