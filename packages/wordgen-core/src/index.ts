export * from "./types";
export * from "./errors";
export { corpusFromLines, loadCorpus, readLines, splitLines } from "./corpus";
export { buildTable, loadTableFromLines, padWord, tableToLines } from "./ngram";
export { drawNext, generate, isKnownWord } from "./generator";
export { DEFAULT_MAX_ATTEMPTS, generateUnknownWord, unwrapGeneration } from "./policy";
export type { GenerationResult } from "./policy";
export { cryptoRandom, mathRandom, sequenceRandom } from "./random";
export { consoleReporter, formatEvent, noopReporter } from "./reporter";
export { applyComplexity } from "./postprocess";
export { generatePassword } from "./password";
export type { PasswordOptions } from "./password";
export { DEFAULT_CONFIG, WordgenConfigSchema, parseConfig } from "./config";
export type { WordgenConfig, WordgenConfigInput } from "./config";
export { WordEngine } from "./engine";
