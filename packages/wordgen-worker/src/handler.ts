import { WordEngine } from "@wordgen/core/src/engine";
import { isWordgenError } from "@wordgen/core/src/errors";
import { unwrapGeneration } from "@wordgen/core/src/policy";
import { cryptoRandom } from "@wordgen/core/src/random";
import type { RandomSource } from "@wordgen/core/src/types";
import { WorkerRequestSchema } from "./protocol";
import type { WorkerErrorKind, WorkerRequest, WorkerResponse } from "./protocol";

function errorReply(id: number, err: unknown): WorkerResponse {
  let kind: WorkerErrorKind = "internal";
  if (isWordgenError(err)) kind = err.kind;
  else if (err instanceof RangeError) kind = "invalid_request";
  const message = err instanceof Error ? err.message : String(err);
  return { id, type: "error", payload: { kind, message } };
}

function requestId(data: unknown): number {
  if (typeof data === "object" && data !== null && "id" in data && typeof data.id === "number") return data.id;
  return -1;
}

export type RequestHandler = (data: unknown) => WorkerResponse;

/** One engine per handler; the worker thread owns it for its whole life. */
export function createRequestHandler(engine = new WordEngine(), rng: RandomSource = cryptoRandom): RequestHandler {
  const run = (req: WorkerRequest): WorkerResponse => {
    switch (req.type) {
      case "init": {
        engine.setOrder(req.payload.order);
        engine.initCorpus(req.payload.words);
        engine.build();
        const { trainingSet, table } = engine.snapshot();
        return { id: req.id, type: "init:ok", payload: { words: trainingSet.size, prefixes: table.size } };
      }
      case "generate": {
        const words: string[] = [];
        for (let i = 0; i < req.payload.count; i++) {
          words.push(unwrapGeneration(engine.generateUnknown(req.payload.length, rng, req.payload.maxAttempts)));
        }
        return { id: req.id, type: "generate:ok", payload: { words } };
      }
    }
  };

  return (data) => {
    const parsed = WorkerRequestSchema.safeParse(data);
    if (!parsed.success) {
      return {
        id: requestId(data),
        type: "error",
        payload: { kind: "invalid_request", message: parsed.error.issues.map((i) => i.message).join("; ") }
      };
    }
    try {
      return run(parsed.data);
    } catch (err) {
      return errorReply(parsed.data.id, err);
    }
  };
}
