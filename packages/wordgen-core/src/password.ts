import type { WordgenConfig } from "./config";
import { applyComplexity } from "./postprocess";
import { generateUnknownWord, unwrapGeneration } from "./policy";
import type { Model, RandomSource } from "./types";

export type PasswordOptions = Pick<
  WordgenConfig,
  "sectionLength" | "sections" | "delimiter" | "capitalsPerSection" | "digitsPerSection" | "maxAttempts"
>;

export function generatePassword(model: Model, options: PasswordOptions, rng: RandomSource): string {
  const parts: string[] = [];
  for (let i = 0; i < options.sections; i++) {
    const word = unwrapGeneration(generateUnknownWord(model, options.sectionLength, rng, options.maxAttempts));
    parts.push(
      applyComplexity(word, { capitals: options.capitalsPerSection, digits: options.digitsPerSection }, rng)
    );
  }
  return parts.join(options.delimiter);
}
