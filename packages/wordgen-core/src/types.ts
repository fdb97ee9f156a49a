export type TrainingSet = ReadonlySet<string>;

export type ChoiceSet = ReadonlyMap<string, number>;

// prefix (exactly `order` chars) -> next char -> count
export type TransitionTable = ReadonlyMap<string, ChoiceSet>;

/** Returns a uniformly distributed value in [0, 1). */
export type RandomSource = () => number;

export type Model = {
  trainingSet: TrainingSet;
  order: number;
  table: TransitionTable;
};

export type ReportEvent =
  | { type: "corpus:read"; source: string; lines: number }
  | { type: "corpus:cleaned"; kept: number; invalid: number; duplicates: number }
  | { type: "table:built"; order: number; prefixes: number; transitions: number }
  | { type: "table:loaded"; source: string; order: number; prefixes: number; transitions: number };

export type Reporter = {
  report(event: ReportEvent): void;
};

export type ComplexityPolicy = {
  capitals: number;
  digits: number;
};

export const START_MARKER = "^";
