import { describe, it, expect } from "vitest";
import { spawnWordgenWorker } from "../src/spawn";
import { WorkerCallError } from "../src/api";

describe("worker thread", () => {
  it("serves init and generate from a spawned thread", async () => {
    const { client, terminate } = spawnWordgenWorker();
    try {
      await expect(client.init(["apple", "apply", "Apple"], 2)).resolves.toEqual({ words: 2, prefixes: 5 });
      const words = await client.generate(3, 4);
      expect(words).toHaveLength(3);
      for (const w of words) expect(w).toBe("appl");
      const err = await client.init(["123"], 2).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(WorkerCallError);
      expect(err).toMatchObject({ kind: "invalid_state" });
      expect(client.inFlight).toBe(0);
    } finally {
      await terminate();
    }
  }, 20_000);
});
