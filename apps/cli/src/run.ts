import { ConfigError, WordEngine, consoleReporter, cryptoRandom, generatePassword, parseConfig } from "@wordgen/core";
import type { RandomSource, Reporter } from "@wordgen/core";
import { parseArgs } from "./args";

export type RunDeps = {
  rng?: RandomSource;
  reporter?: Reporter;
  print?: (text: string) => void;
  copy?: (text: string) => Promise<void>;
  log?: (line: string) => void;
};

async function copyToClipboard(text: string): Promise<void> {
  const { default: clipboard } = await import("clipboardy");
  await clipboard.write(text);
}

export async function run(argv: readonly string[], deps: RunDeps = {}): Promise<string> {
  const args = parseArgs(argv);
  if (args.unknown.length > 0) throw new ConfigError(args.unknown.map((arg) => `${arg}: unknown option`));
  const config = parseConfig(args.config);
  const log = deps.log ?? ((line: string) => console.error(line));

  const engine = new WordEngine(config.order, deps.reporter ?? consoleReporter(log));
  await engine.loadCorpus(config.wordlist);
  if (config.table) await engine.loadTable(config.table);
  else engine.build();
  const password = generatePassword(engine.snapshot(), config, deps.rng ?? cryptoRandom);

  if (args.output === "print") {
    (deps.print ?? ((text: string) => console.log(text)))(password);
  } else {
    await (deps.copy ?? copyToClipboard)(password);
    log("[password] copied to clipboard");
  }
  return password;
}
