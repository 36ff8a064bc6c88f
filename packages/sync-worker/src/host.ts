import { SyncEngine } from "@wordsync/sync-core/src/engine";
import { sinkFromFunctions } from "@wordsync/sync-core/src/sink";
import type { SyncConfig } from "@wordsync/sync-core/src/config";
import type { Logger } from "@wordsync/sync-core/src/log";
import type { SinkOp } from "@wordsync/sync-core/src/types";
import { WorkerRequestSchema, type WorkerReply } from "./protocol";

export type SessionHostOptions = {
  config?: Partial<SyncConfig>;
  logger?: Logger;
};

/** One engine answering requests in arrival order; nothing runs concurrently. */
export function createSessionHost(options: SessionHostOptions = {}) {
  let ops: SinkOp[] = [];
  const engine = new SyncEngine(
    sinkFromFunctions(
      (count) => ops.push({ op: "delete", count }),
      (text) => ops.push({ op: "insert", text })
    ),
    options
  );

  function handle(message: unknown): WorkerReply {
    const parsed = WorkerRequestSchema.safeParse(message);
    if (!parsed.success) {
      const id = typeof message === "object" && message !== null && "id" in message && typeof message.id === "number" ? message.id : null;
      return { id, ok: false, error: `invalid request: ${parsed.error.issues.map((i) => i.message).join("; ")}` };
    }
    const req = parsed.data;
    ops = [];
    try {
      if (req.type === "reset") {
        engine.reset(req.payload);
        return { id: req.id, ok: true, ops, applied: [], issues: [] };
      }
      const result = req.type === "chunk" ? engine.processChunk(req.payload) : engine.endStream();
      return { id: req.id, ok: true, ops, ...result };
    } catch (err) {
      const detail = err instanceof Error ? err.message : "unknown error";
      return { id: req.id, ok: false, error: detail };
    }
  }

  return { engine, handle };
}

export type SessionHost = ReturnType<typeof createSessionHost>;
