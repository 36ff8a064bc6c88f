import { z } from "zod";

const ChunkSchema = z.union([z.string(), z.instanceof(Uint8Array)]);

export const WorkerRequestSchema = z.discriminatedUnion("type", [
  z.object({ id: z.number().int(), type: z.literal("reset"), payload: z.record(z.string()) }),
  z.object({ id: z.number().int(), type: z.literal("chunk"), payload: ChunkSchema }),
  z.object({ id: z.number().int(), type: z.literal("end") })
]);

export type WorkerRequest = z.infer<typeof WorkerRequestSchema>;

const SinkOpSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("delete"), count: z.number().int().min(0) }),
  z.object({ op: z.literal("insert"), text: z.string() })
]);

const UpdateRecordSchema = z.object({ position: z.number().int(), content: z.string() });

const SyncIssueSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("MalformedMarker"),
    reason: z.enum(["mismatched_close", "open_before_close", "stray_close", "unterminated", "marker_too_long"]),
    id: z.number().int().optional(),
    closeId: z.number().int().optional()
  }),
  z.object({ kind: z.literal("OutOfOrderPosition"), position: z.number().int(), cursor: z.number().int() }),
  z.object({ kind: z.literal("ProtocolNoise"), text: z.string() })
]);

export const WorkerReplySchema = z.union([
  z.object({
    id: z.number().int(),
    ok: z.literal(true),
    ops: z.array(SinkOpSchema),
    applied: z.array(UpdateRecordSchema),
    issues: z.array(SyncIssueSchema)
  }),
  z.object({ id: z.number().int().nullable(), ok: z.literal(false), error: z.string() })
]);

export type WorkerReply = z.infer<typeof WorkerReplySchema>;
export type WorkerResult = Extract<WorkerReply, { ok: true }>;
