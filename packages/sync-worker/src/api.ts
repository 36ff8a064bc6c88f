import { isPositionMap, type BaselineInput, type Chunk } from "@wordsync/sync-core";
import { WorkerReplySchema, type WorkerResult } from "./protocol";

/** A worker_threads Worker or MessagePort, or anything shaped like one. */
export type WorkerPort = {
  postMessage(message: unknown): void;
  on(event: "message", listener: (message: unknown) => void): unknown;
};

type Pending = {
  resolve: (result: WorkerResult) => void;
  reject: (err: Error) => void;
};

type RequestBody =
  | { type: "reset"; payload: Record<string, string> }
  | { type: "chunk"; payload: Chunk }
  | { type: "end" };

function toPayload(baseline: BaselineInput): Record<string, string> {
  if (isPositionMap(baseline)) {
    return Object.fromEntries([...baseline].map(([p, c]): [string, string] => [String(p), c]));
  }
  return { ...baseline };
}

export class SessionWorkerClient {
  private port: WorkerPort;
  private nextId = 1;
  private pending = new Map<number, Pending>();

  constructor(port: WorkerPort) {
    this.port = port;
    this.port.on("message", (message) => {
      const parsed = WorkerReplySchema.safeParse(message);
      if (!parsed.success) return;
      const reply = parsed.data;
      if (reply.id === null) return;
      const entry = this.pending.get(reply.id);
      if (!entry) return;
      this.pending.delete(reply.id);
      if (reply.ok) entry.resolve(reply);
      else entry.reject(new Error(reply.error));
    });
  }

  async reset(baseline: BaselineInput): Promise<WorkerResult> {
    return this.rpc({ type: "reset", payload: toPayload(baseline) });
  }

  async processChunk(chunk: Chunk): Promise<WorkerResult> {
    return this.rpc({ type: "chunk", payload: chunk });
  }

  async endStream(): Promise<WorkerResult> {
    return this.rpc({ type: "end" });
  }

  get inFlight(): number {
    return this.pending.size;
  }

  private rpc(body: RequestBody): Promise<WorkerResult> {
    const id = this.nextId++;
    return new Promise<WorkerResult>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.port.postMessage({ id, ...body });
    });
  }
}
