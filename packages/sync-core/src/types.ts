export type Position = number;

export type UpdateRecord = {
  position: Position;
  content: string; // already entity-decoded; "" removes the word
};

export type SessionPhase = "awaiting_first_update" | "synchronizing";

export type SinkOp =
  | { op: "delete"; count: number }
  | { op: "insert"; text: string };

export type MalformedReason =
  | "mismatched_close"
  | "open_before_close"
  | "stray_close"
  | "unterminated"
  | "marker_too_long";

export type SyncIssue =
  | { kind: "MalformedMarker"; reason: MalformedReason; id?: Position; closeId?: Position }
  | { kind: "OutOfOrderPosition"; position: Position; cursor: Position }
  | { kind: "ProtocolNoise"; text: string };

export type ParseResult = {
  records: UpdateRecord[];
  issues: SyncIssue[];
};

export type ProcessResult = {
  applied: UpdateRecord[];
  issues: SyncIssue[];
};

export type Chunk = string | Uint8Array;
