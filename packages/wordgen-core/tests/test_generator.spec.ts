import { describe, it, expect } from "vitest";
import { drawNext, generate, isKnownWord } from "../src/generator";
import { buildTable, padWord } from "../src/ngram";
import { mathRandom, sequenceRandom } from "../src/random";
import { ExhaustedTransitionsError } from "../src/errors";

const appleApply = new Set(["apple", "apply"]);

describe("weighted draw", () => {
  it("picks by cumulative count", () => {
    const row = new Map([["a", 1], ["b", 3]]);
    expect(drawNext(row, sequenceRandom([0.24]))).toBe("a");
    expect(drawNext(row, sequenceRandom([0.25]))).toBe("b");
    expect(drawNext(row, sequenceRandom([0.99]))).toBe("b");
  });

  it("rejects a random value outside [0, 1)", () => {
    const row = new Map([["a", 1]]);
    expect(() => drawNext(row, () => 1)).toThrow(RangeError);
    expect(() => drawNext(row, () => -0.1)).toThrow(RangeError);
  });
});

describe("generate", () => {
  it("follows the only path through apple/apply", () => {
    const t = buildTable(appleApply, 2);
    expect(generate(t, 2, 5, sequenceRandom([0.1]))).toBe("apple");
    expect(generate(t, 2, 5, sequenceRandom([0.9]))).toBe("apply");
    for (let i = 0; i < 20; i++) {
      expect(generate(t, 2, 5, mathRandom)).toMatch(/^appl[ey]$/);
    }
  });

  it("returns exactly the requested number of letters", () => {
    const t = buildTable(new Set(["banana", "nab", "abba"]), 1);
    for (let i = 0; i < 50; i++) {
      const w = generate(t, 1, 8, mathRandom);
      expect(w).toMatch(/^[abn]{8}$/);
    }
  });

  it("only uses transitions seen in training", () => {
    const t = buildTable(new Set(["banana", "nab", "abba"]), 2);
    for (let i = 0; i < 50; i++) {
      let w: string;
      try {
        w = generate(t, 2, 5, mathRandom);
      } catch (err) {
        expect(err).toBeInstanceOf(ExhaustedTransitionsError);
        continue;
      }
      const padded = padWord(w, 2);
      for (let j = 0; j + 2 < padded.length; j++) {
        expect(t.get(padded.slice(j, j + 2))?.has(padded[j + 2])).toBe(true);
      }
    }
  });

  it("is reproducible for a fixed random sequence", () => {
    const t = buildTable(new Set(["stone", "story", "stare", "start", "tone", "total"]), 2);
    const draws = [0.3, 0.7, 0.1, 0.55];
    expect(generate(t, 2, 4, sequenceRandom(draws))).toBe("stor");
    expect(generate(t, 2, 4, sequenceRandom(draws))).toBe("stor");
  });

  it("returns an empty string for length 0", () => {
    expect(generate(buildTable(appleApply, 2), 2, 0, mathRandom)).toBe("");
  });

  it("rejects an invalid length", () => {
    const t = buildTable(appleApply, 2);
    expect(() => generate(t, 2, -1, mathRandom)).toThrow(RangeError);
    expect(() => generate(t, 2, 2.5, mathRandom)).toThrow(RangeError);
  });

  it("fails past the end of every observed context", () => {
    const t = buildTable(new Set(["cat", "dog"]), 5);
    expect(generate(t, 5, 3, sequenceRandom([0.1]))).toBe("cat");
    let caught: unknown;
    try {
      generate(t, 5, 4, sequenceRandom([0.1]));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ExhaustedTransitionsError);
    expect(caught).toMatchObject({ kind: "exhausted_transitions", prefix: "^^cat" });
  });
});

describe("known words", () => {
  it("checks exact membership", () => {
    expect(isKnownWord(appleApply, "apple")).toBe(true);
    expect(isKnownWord(appleApply, "Apple")).toBe(false);
    expect(isKnownWord(appleApply, "appl")).toBe(false);
  });
});
