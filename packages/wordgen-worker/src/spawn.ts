import { Worker } from "node:worker_threads";
import { WordgenWorkerClient } from "./api";

export type SpawnedWorker = {
  client: WordgenWorkerClient;
  terminate(): Promise<number>;
};

// The entry is TypeScript, so the thread needs the tsx loader.
export function spawnWordgenWorker(): SpawnedWorker {
  const worker = new Worker(new URL("./worker.ts", import.meta.url), { execArgv: ["--import", "tsx"] });
  return { client: new WordgenWorkerClient(worker), terminate: () => worker.terminate() };
}
