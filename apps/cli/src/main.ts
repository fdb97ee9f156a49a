#!/usr/bin/env tsx
import { run } from "./run";

run(process.argv.slice(2)).catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
