import { promises as fs } from "node:fs";
import path from "node:path";
import { loadCorpus } from "../src/corpus";
import { buildTable, tableToLines } from "../src/ngram";
import { consoleReporter } from "../src/reporter";

type Config = {
  wordlist: string;
  outDir: string;
  order: number;
  topPrefixes: number;
};

const DEFAULT_CONFIG: Config = {
  wordlist: "/usr/share/dict/words",
  outDir: path.resolve("corpus/generated"),
  order: 3,
  topPrefixes: 30
};

function parseArgs(): Config {
  const cfg: Config = { ...DEFAULT_CONFIG };
  for (const arg of process.argv.slice(2)) {
    const [key, value] = arg.split("=");
    if (!key || value === undefined) continue;
    switch (key) {
      case "--wordlist":
        cfg.wordlist = path.resolve(value);
        break;
      case "--out":
        cfg.outDir = path.resolve(value);
        break;
      case "--order":
        cfg.order = Number(value);
        break;
      case "--top-prefixes":
        cfg.topPrefixes = Number(value);
        break;
      default:
        break;
    }
  }
  return cfg;
}

async function main(): Promise<void> {
  const cfg = parseArgs();
  const reporter = consoleReporter((line) => console.log(line));
  const words = await loadCorpus(cfg.wordlist, reporter);
  const table = buildTable(words, cfg.order, reporter);
  const rows = tableToLines(table);

  await fs.mkdir(cfg.outDir, { recursive: true });
  const tablePath = path.join(cfg.outDir, `table_order${cfg.order}.tsv`);
  const reportPath = path.join(cfg.outDir, `table_order${cfg.order}.report.json`);

  const topPrefixes = [...table.entries()]
    .map(([prefix, row]) => ({ prefix, nextKinds: row.size }))
    .sort((a, b) => b.nextKinds - a.nextKinds || a.prefix.localeCompare(b.prefix))
    .slice(0, cfg.topPrefixes);

  const report = {
    config: cfg,
    words: words.size,
    prefixes: table.size,
    transitions: rows.length,
    topPrefixes
  };

  await fs.writeFile(tablePath, rows.join("\n") + "\n", "utf8");
  await fs.writeFile(reportPath, JSON.stringify(report, null, 2), "utf8");

  console.log(`[table] rows: ${tablePath} (${rows.length})`);
  console.log(`[table] report: ${reportPath}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
