import { promises as fs } from "node:fs";
import { NotFoundError } from "./errors";
import { noopReporter } from "./reporter";
import type { Reporter, TrainingSet } from "./types";

const alphaRe = /^[A-Za-z]+$/;

export function splitLines(raw: string): string[] {
  return raw.split(/\r?\n/);
}

export function corpusFromLines(lines: readonly string[], reporter: Reporter = noopReporter): TrainingSet {
  const words = new Set<string>();
  let invalid = 0;
  let duplicates = 0;
  for (const line of lines) {
    const word = line.trim();
    if (!alphaRe.test(word)) {
      invalid += 1;
      continue;
    }
    const lower = word.toLowerCase();
    if (words.has(lower)) duplicates += 1;
    else words.add(lower);
  }
  reporter.report({ type: "corpus:cleaned", kept: words.size, invalid, duplicates });
  return words;
}

/** Reads a newline-delimited file; any read failure is a NotFoundError. */
export async function readLines(path: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(path, "utf8");
  } catch (err) {
    throw new NotFoundError(path, err);
  }
  const lines = splitLines(raw);
  // A trailing newline is not an entry.
  if (lines.length && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export async function loadCorpus(path: string, reporter: Reporter = noopReporter): Promise<TrainingSet> {
  const lines = await readLines(path);
  reporter.report({ type: "corpus:read", source: path, lines: lines.length });
  return corpusFromLines(lines, reporter);
}
