import { WordEngine } from "../src/engine";
import { mathRandom } from "../src/random";

const e = new WordEngine(3);
const words: string[] = [];
for (let i = 0; i < 5000; i++) words.push("word" + i.toString(36).replace(/[0-9]/g, "x"));
e.initCorpus(words);

const b0 = performance.now();
e.build();
const buildMs = performance.now() - b0;

const t0 = performance.now();
for (let i = 0; i < 1000; i++) e.generateUnknown(6, mathRandom);
const dt = performance.now() - t0;
console.log(`bench_generate build ms: ${buildMs.toFixed(2)}, 1000 words ms: ${dt.toFixed(2)}`);
