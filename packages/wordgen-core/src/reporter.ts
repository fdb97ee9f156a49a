import type { ReportEvent, Reporter } from "./types";

export const noopReporter: Reporter = {
  report() {}
};

export function formatEvent(event: ReportEvent): string {
  switch (event.type) {
    case "corpus:read":
      return `[corpus] read ${event.lines} lines from "${event.source}"`;
    case "corpus:cleaned":
      return `[corpus] kept ${event.kept} words, removed ${event.invalid} invalid and ${event.duplicates} duplicate lines`;
    case "table:built":
      return `[table] order ${event.order}: ${event.prefixes} prefixes, ${event.transitions} transitions`;
    case "table:loaded":
      return `[table] loaded "${event.source}" at order ${event.order}: ${event.prefixes} prefixes, ${event.transitions} transitions`;
  }
}

/** Writes one tagged line per event; stderr by default so stdout stays clean for output. */
export function consoleReporter(write: (line: string) => void = (line) => console.error(line)): Reporter {
  return {
    report(event) {
      write(formatEvent(event));
    }
  };
}
