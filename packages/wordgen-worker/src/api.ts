import { WorkerResponseSchema } from "./protocol";
import type { WorkerErrorKind, WorkerRequest, WorkerResponse } from "./protocol";

export type WorkerEvent = "message" | "error" | "exit";

/** The part of a node:worker_threads Worker the client talks to. */
export type WorkerPort = {
  postMessage(message: WorkerRequest): void;
  on(event: WorkerEvent, listener: (value: unknown) => void): unknown;
};

export class WorkerCallError extends Error {
  readonly kind: WorkerErrorKind;

  constructor(kind: WorkerErrorKind, message: string) {
    super(message);
    this.name = "WorkerCallError";
    this.kind = kind;
  }
}

function replyId(data: unknown): number | undefined {
  if (typeof data === "object" && data !== null && "id" in data && typeof data.id === "number") return data.id;
  return undefined;
}

type Pending = {
  resolve: (res: WorkerResponse) => void;
  reject: (err: Error) => void;
};

export class WordgenWorkerClient {
  private nextId = 1;
  private pending = new Map<number, Pending>();
  private closed: WorkerCallError | undefined;

  constructor(private readonly port: WorkerPort) {
    this.port.on("message", (data) => this.onMessage(data));
    this.port.on("error", (err) => {
      this.fail(`worker failed: ${err instanceof Error ? err.message : String(err)}`);
    });
    this.port.on("exit", (code) => {
      this.fail(`worker exited with code ${String(code)}`);
    });
  }

  get inFlight(): number {
    return this.pending.size;
  }

  async init(words: string[], order: number): Promise<{ words: number; prefixes: number }> {
    const res = await this.send({ id: this.nextId++, type: "init", payload: { words, order } });
    if (res.type !== "init:ok") throw new WorkerCallError("internal", `unexpected reply ${res.type} to init`);
    return res.payload;
  }

  async generate(count: number, length: number, maxAttempts?: number): Promise<string[]> {
    const res = await this.send({ id: this.nextId++, type: "generate", payload: { count, length, maxAttempts } });
    if (res.type !== "generate:ok") throw new WorkerCallError("internal", `unexpected reply ${res.type} to generate`);
    return res.payload.words;
  }

  private onMessage(data: unknown): void {
    const parsed = WorkerResponseSchema.safeParse(data);
    if (!parsed.success) {
      const id = replyId(data);
      const cb = id === undefined ? undefined : this.pending.get(id);
      if (id === undefined || !cb) return;
      this.pending.delete(id);
      cb.reject(new WorkerCallError("internal", `malformed reply: ${parsed.error.issues.map((i) => i.message).join("; ")}`));
      return;
    }
    const res = parsed.data;
    const cb = this.pending.get(res.id);
    if (!cb) return;
    this.pending.delete(res.id);
    if (res.type === "error") cb.reject(new WorkerCallError(res.payload.kind, res.payload.message));
    else cb.resolve(res);
  }

  // Settles every call in flight; later calls reject straight away.
  private fail(message: string): void {
    const err = this.closed ?? new WorkerCallError("internal", message);
    this.closed = err;
    for (const cb of this.pending.values()) cb.reject(err);
    this.pending.clear();
  }

  private send(req: WorkerRequest): Promise<WorkerResponse> {
    if (this.closed) return Promise.reject(this.closed);
    return new Promise<WorkerResponse>((resolve, reject) => {
      this.pending.set(req.id, { resolve, reject });
      this.port.postMessage(req);
    });
  }
}
