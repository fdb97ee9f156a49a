import { InvalidStateError } from "./errors";
import { noopReporter } from "./reporter";
import { START_MARKER } from "./types";
import type { Reporter, TrainingSet, TransitionTable } from "./types";

export function assertOrder(order: number): void {
  if (!Number.isInteger(order) || order < 1) {
    throw new RangeError(`order must be a positive integer, got ${order}`);
  }
}

export function padWord(word: string, order: number): string {
  return START_MARKER.repeat(order) + word;
}

/**
 * Counts how often each character follows each `order`-wide window.
 *
 * "apple" at order 2 is padded to "^^apple" and yields
 * ^^ -> a, ^a -> p, ap -> p, pp -> l, pl -> e.
 */
export function buildTable(
  trainingSet: TrainingSet | undefined,
  order: number,
  reporter: Reporter = noopReporter
): TransitionTable {
  assertOrder(order);
  if (!trainingSet || trainingSet.size === 0) {
    throw new InvalidStateError("Wordlist is not loaded or empty, load a wordlist first.");
  }

  const table = new Map<string, Map<string, number>>();
  let transitions = 0;
  for (const word of trainingSet) {
    const padded = padWord(word, order);
    for (let i = 0; i + order < padded.length; i++) {
      const prefix = padded.slice(i, i + order);
      const next = padded[i + order];
      const row = table.get(prefix) ?? new Map<string, number>();
      row.set(next, (row.get(next) ?? 0) + 1);
      table.set(prefix, row);
      transitions += 1;
    }
  }

  reporter.report({ type: "table:built", order, prefixes: table.size, transitions });
  return table;
}

export function tableToLines(table: TransitionTable): string[] {
  const out: string[] = [];
  const prefixes = [...table.keys()].sort();
  for (const prefix of prefixes) {
    const row = table.get(prefix) ?? new Map<string, number>();
    const sorted = [...row.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
    for (const [next, count] of sorted) out.push(`${prefix}\t${next}\t${count}`);
  }
  return out;
}

const prefixRe = /^\^*[a-z]*$/;
const nextRe = /^[a-z]$/;

/**
 * Parses `prefix\tnext\tcount` rows written by tableToLines. Blank lines are skipped;
 * any other row that could not come from buildTable at this order is an InvalidStateError.
 */
export function loadTableFromLines(lines: readonly string[], order: number): TransitionTable {
  assertOrder(order);
  const table = new Map<string, Map<string, number>>();
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line.trim()) continue;
    const fields = line.split("\t");
    const where = `table row ${i + 1}`;
    if (fields.length !== 3) throw new InvalidStateError(`${where}: expected prefix, next and count`);
    const [prefix, next, countRaw] = fields;
    if (prefix.length !== order || !prefixRe.test(prefix)) {
      throw new InvalidStateError(`${where}: prefix '${prefix}' is not ${order} characters of ${START_MARKER} then a-z`);
    }
    if (!nextRe.test(next)) throw new InvalidStateError(`${where}: next character '${next}' is not a-z`);
    const count = Number(countRaw);
    if (!Number.isInteger(count) || count < 1) {
      throw new InvalidStateError(`${where}: count '${countRaw}' is not a positive integer`);
    }
    const row = table.get(prefix) ?? new Map<string, number>();
    row.set(next, (row.get(next) ?? 0) + count);
    table.set(prefix, row);
  }
  if (table.size === 0) throw new InvalidStateError("Transition table has no rows.");
  return table;
}
