import { describe, it, expect } from "vitest";
import { applyComplexity } from "../src/postprocess";
import { sequenceRandom } from "../src/random";

describe("complexity post-processing", () => {
  it("upper-cases then swaps in a digit at drawn positions", () => {
    // capital at 3, digit 7 at 0
    expect(applyComplexity("abcdef", { capitals: 1, digits: 1 }, sequenceRandom([0.5, 0.0, 0.75]))).toBe("7bcDef");
  });

  it("lets a digit overwrite a capital", () => {
    expect(applyComplexity("abcdef", { capitals: 1, digits: 1 }, sequenceRandom([0.5, 0.5, 0.35]))).toBe("abc3ef");
  });

  it("leaves the word alone with nothing to inject", () => {
    expect(applyComplexity("abcdef", { capitals: 0, digits: 0 }, sequenceRandom([0.5]))).toBe("abcdef");
    expect(applyComplexity("", { capitals: 2, digits: 2 }, sequenceRandom([0.5]))).toBe("");
  });

  it("rejects negative counts", () => {
    expect(() => applyComplexity("abc", { capitals: -1, digits: 0 }, sequenceRandom([0.5]))).toThrow(RangeError);
  });
});
