import { describe, it, expect } from "vitest";
import { generateUnknownWord, unwrapGeneration } from "../src/policy";
import { buildTable } from "../src/ngram";
import { sequenceRandom } from "../src/random";
import { ExhaustedTransitionsError, GenerationExhaustedError } from "../src/errors";
import type { Model } from "../src/types";

const table = buildTable(new Set(["apple", "apply"]), 2);

function model(known: string[]): Model {
  return { trainingSet: new Set(known), order: 2, table };
}

// five draws per five-letter word; only the last one picks between e and y
const APPLE = [0.1, 0.1, 0.1, 0.1, 0.1];
const APPLY = [0.9, 0.9, 0.9, 0.9, 0.9];

describe("non-dictionary retry", () => {
  it("accepts the first unknown word", () => {
    const r = generateUnknownWord(model(["apple"]), 5, sequenceRandom(APPLY), 3);
    expect(r).toEqual({ ok: true, word: "apply", attempts: 1 });
  });

  it("retries after hitting a known word", () => {
    const r = generateUnknownWord(model(["apple"]), 5, sequenceRandom([...APPLE, ...APPLY]), 3);
    expect(r).toEqual({ ok: true, word: "apply", attempts: 2 });
  });

  it("is exhausted when every attempt is a known word", () => {
    const r = generateUnknownWord(model(["apple", "apply"]), 5, sequenceRandom([0.5]), 3);
    expect(r.ok).toBe(false);
    expect(r.attempts).toBe(3);
    if (!r.ok) {
      expect(r.error).toBeInstanceOf(GenerationExhaustedError);
      expect(r.error.kind).toBe("generation_exhausted");
      expect(r.error.attempts).toBe(3);
    }
  });

  it("lets transition errors through", () => {
    expect(() => generateUnknownWord(model([]), 6, sequenceRandom([0.5]), 3)).toThrow(ExhaustedTransitionsError);
  });

  it("rejects a non-positive attempt budget", () => {
    expect(() => generateUnknownWord(model([]), 5, sequenceRandom([0.5]), 0)).toThrow(RangeError);
  });

  it("unwraps to the word or throws the carried error", () => {
    expect(unwrapGeneration({ ok: true, word: "apply", attempts: 1 })).toBe("apply");
    const error = new GenerationExhaustedError(2);
    expect(() => unwrapGeneration({ ok: false, error, attempts: 2 })).toThrow(error);
  });
});
