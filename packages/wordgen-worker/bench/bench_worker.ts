import { spawnWordgenWorker } from "../src/spawn";

const words: string[] = [];
for (let i = 0; i < 5000; i++) words.push("word" + i.toString(36).replace(/[0-9]/g, "x"));

async function main(): Promise<void> {
  const threads = [spawnWordgenWorker(), spawnWordgenWorker()];
  try {
    await Promise.all(threads.map((t) => t.client.init(words, 3)));
    const t0 = performance.now();
    const batches = await Promise.all(threads.map((t) => t.client.generate(500, 6)));
    const dt = performance.now() - t0;
    console.log(`bench_worker ${batches.flat().length} words ms: ${dt.toFixed(2)}`);
  } finally {
    await Promise.all(threads.map((t) => t.terminate()));
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
