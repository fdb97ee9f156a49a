export type WordgenErrorKind =
  | "not_found"
  | "invalid_state"
  | "invalid_config"
  | "exhausted_transitions"
  | "generation_exhausted";

export class WordgenError extends Error {
  readonly kind: WordgenErrorKind;

  constructor(kind: WordgenErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class NotFoundError extends WordgenError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super("not_found", `Wordlist file not found or unreadable: "${path}"`, { cause });
    this.path = path;
  }
}

export class InvalidStateError extends WordgenError {
  constructor(message: string) {
    super("invalid_state", message);
  }
}

export class ConfigError extends WordgenError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("invalid_config", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class ExhaustedTransitionsError extends WordgenError {
  readonly prefix: string;

  constructor(prefix: string) {
    super(
      "exhausted_transitions",
      `No transitions found for prefix '${prefix}'. Consider decreasing the order or using a different word list.`
    );
    this.prefix = prefix;
  }
}

export class GenerationExhaustedError extends WordgenError {
  readonly attempts: number;

  constructor(attempts: number) {
    super("generation_exhausted", `Failed to generate a non-dictionary word after ${attempts} attempts.`);
    this.attempts = attempts;
  }
}

export function isWordgenError(value: unknown): value is WordgenError {
  return value instanceof WordgenError;
}
