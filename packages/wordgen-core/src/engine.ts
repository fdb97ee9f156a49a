import { corpusFromLines, loadCorpus, readLines } from "./corpus";
import { InvalidStateError } from "./errors";
import { generate, isKnownWord } from "./generator";
import { assertOrder, buildTable, loadTableFromLines } from "./ngram";
import { noopReporter } from "./reporter";
import { DEFAULT_MAX_ATTEMPTS, generateUnknownWord } from "./policy";
import type { GenerationResult } from "./policy";
import type { Model, RandomSource, Reporter, TrainingSet, TransitionTable } from "./types";

export class WordEngine {
  private trainingSet: TrainingSet | undefined;
  private table: TransitionTable | undefined;
  private currentOrder: number;

  constructor(order = 3, private readonly reporter: Reporter = noopReporter) {
    assertOrder(order);
    this.currentOrder = order;
  }

  get order(): number {
    return this.currentOrder;
  }

  get isBuilt(): boolean {
    return this.table !== undefined;
  }

  async loadCorpus(path: string): Promise<void> {
    this.trainingSet = await loadCorpus(path, this.reporter);
    this.table = undefined;
  }

  initCorpus(lines: readonly string[]): void {
    this.trainingSet = corpusFromLines(lines, this.reporter);
    this.table = undefined;
  }

  /** Uses a table written by tableToLines at the current order instead of build(). */
  async loadTable(path: string): Promise<void> {
    const lines = await readLines(path);
    const table = loadTableFromLines(lines, this.currentOrder);
    let transitions = 0;
    for (const row of table.values()) for (const count of row.values()) transitions += count;
    this.table = table;
    this.reporter.report({ type: "table:loaded", source: path, order: this.currentOrder, prefixes: table.size, transitions });
  }

  /** Changing the order drops the table; call build() again. */
  setOrder(order: number): void {
    assertOrder(order);
    if (order === this.currentOrder) return;
    this.currentOrder = order;
    this.table = undefined;
  }

  build(): void {
    this.table = buildTable(this.trainingSet, this.currentOrder, this.reporter);
  }

  generate(length: number, rng: RandomSource): string {
    const { table, order } = this.snapshot();
    return generate(table, order, length, rng);
  }

  generateUnknown(length: number, rng: RandomSource, maxAttempts = DEFAULT_MAX_ATTEMPTS): GenerationResult {
    return generateUnknownWord(this.snapshot(), length, rng, maxAttempts);
  }

  isKnownWord(candidate: string): boolean {
    return this.trainingSet ? isKnownWord(this.trainingSet, candidate) : false;
  }

  snapshot(): Model {
    if (!this.trainingSet || !this.table) {
      throw new InvalidStateError("Transition table is not available, build the transition table first.");
    }
    return { trainingSet: this.trainingSet, order: this.currentOrder, table: this.table };
  }
}
