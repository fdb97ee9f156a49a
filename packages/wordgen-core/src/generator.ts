import { ExhaustedTransitionsError } from "./errors";
import { assertOrder } from "./ngram";
import { unitSample } from "./random";
import { START_MARKER } from "./types";
import type { ChoiceSet, RandomSource, TrainingSet, TransitionTable } from "./types";

export function drawNext(choices: ChoiceSet, rng: RandomSource): string {
  let total = 0;
  for (const count of choices.values()) total += count;
  const target = unitSample(rng) * total;
  let acc = 0;
  let last = "";
  for (const [next, count] of choices) {
    acc += count;
    last = next;
    if (target < acc) return next;
  }
  // Unreachable while every count is positive.
  return last;
}

export function generate(table: TransitionTable, order: number, length: number, rng: RandomSource): string {
  assertOrder(order);
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`length must be a non-negative integer, got ${length}`);
  }

  let buffer = START_MARKER.repeat(order);
  while (buffer.length < length + order) {
    const prefix = buffer.slice(-order);
    const choices = table.get(prefix);
    if (!choices || choices.size === 0) throw new ExhaustedTransitionsError(prefix);
    buffer += drawNext(choices, rng);
  }
  return buffer.slice(order);
}

export function isKnownWord(trainingSet: TrainingSet, candidate: string): boolean {
  return trainingSet.has(candidate);
}
