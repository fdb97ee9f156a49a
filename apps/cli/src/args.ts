import type { WordgenConfigInput } from "@wordgen/core";

export type OutputMode = "copy" | "print";

export type CliArgs = {
  config: WordgenConfigInput;
  output: OutputMode;
  /** Arguments that name no option, kept so the caller can refuse them. */
  unknown: string[];
};

// Values stay raw; parseConfig rejects what does not fit.
export function parseArgs(argv: readonly string[]): CliArgs {
  const config: WordgenConfigInput = {};
  let output: OutputMode = "copy";
  const unknown: string[] = [];
  for (const arg of argv) {
    if (arg === "--print") {
      output = "print";
      continue;
    }
    if (arg === "--copy") {
      output = "copy";
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq < 0) {
      unknown.push(arg);
      continue;
    }
    const key = arg.slice(0, eq);
    const value = arg.slice(eq + 1);
    switch (key) {
      case "--wordlist":
        config.wordlist = value;
        break;
      case "--table":
        config.table = value;
        break;
      case "--order":
        config.order = Number(value);
        break;
      case "--length":
        config.sectionLength = Number(value);
        break;
      case "--sections":
        config.sections = Number(value);
        break;
      case "--delimiter":
        config.delimiter = value;
        break;
      case "--capitals":
        config.capitalsPerSection = Number(value);
        break;
      case "--digits":
        config.digitsPerSection = Number(value);
        break;
      case "--attempts":
        config.maxAttempts = Number(value);
        break;
      default:
        unknown.push(arg);
    }
  }
  return { config, output, unknown };
}
