import type { Chunk, ParseResult, ProcessResult, SessionPhase, SinkOp, SyncIssue, UpdateRecord } from "./types";
import { resolveConfig, type SyncConfig } from "./config";
import { createConsoleLogger, type Logger } from "./log";
import { createBaseline, positionsBetween, type Baseline, type BaselineInput } from "./baseline";
import { computeFirstEdit } from "./diff";
import { FragmentReassembler } from "./reassembler";
import { createSessionStore, type SessionStore } from "./state";
import type { OutputSink } from "./sink";

export type SyncEngineOptions = {
  config?: Partial<SyncConfig>;
  logger?: Logger;
};

function isBaseline(input: Baseline | BaselineInput): input is Baseline {
  return "positions" in input && Array.isArray(input.positions);
}

export function describeIssue(issue: SyncIssue): string {
  switch (issue.kind) {
    case "MalformedMarker":
      return `malformed marker (${issue.reason})${issue.id !== undefined ? ` id=${issue.id}` : ""}${
        issue.closeId !== undefined ? ` close=${issue.closeId}` : ""
      }`;
    case "OutOfOrderPosition":
      return `out-of-order position ${issue.position} at cursor ${issue.cursor}, record dropped`;
    case "ProtocolNoise":
      return `protocol noise dropped: ${JSON.stringify(issue.text)}`;
  }
}

/**
 * Keeps a keystroke-driven surface in step with a stream of word updates.
 *
 * The first record of a session triggers the only deletion; every later
 * record is typed after the synchronized-through cursor, filling skipped
 * baseline words on the way.
 *
 * Session state moves before the sink is called. Operations wait in an
 * outbox until the sink accepts them; after a sink throw, the failed
 * operation and any records still queued go out first on the next call.
 */
export class SyncEngine {
  readonly config: SyncConfig;
  readonly store: SessionStore = createSessionStore();
  private readonly sink: OutputSink;
  private readonly logger: Logger;
  private readonly reassembler: FragmentReassembler;
  private backlog: UpdateRecord[] = [];
  private outbox: SinkOp[] = [];
  private held: ProcessResult = { applied: [], issues: [] };

  constructor(sink: OutputSink, options: SyncEngineOptions = {}) {
    this.sink = sink;
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? createConsoleLogger("sync", this.config.debug);
    this.reassembler = new FragmentReassembler(this.config);
  }

  get phase(): SessionPhase {
    return this.store.getState().phase;
  }

  get cursor(): number | undefined {
    return this.store.getState().cursor;
  }

  get baseline(): Baseline {
    return this.store.getState().baseline;
  }

  /** Operations accepted by the engine but not yet by the sink. */
  get pendingOps(): readonly SinkOp[] {
    return this.outbox;
  }

  reset(mapping: Baseline | BaselineInput): void {
    // A prebuilt baseline is rebuilt from its content so the ordering holds.
    const baseline = createBaseline(isBaseline(mapping) ? mapping.content : mapping);
    this.reassembler.reset();
    this.backlog = [];
    this.outbox = [];
    this.held = { applied: [], issues: [] };
    this.store.getState().beginSession(baseline);
    this.logger.debug(`reset: ${baseline.positions.length} baseline words`);
  }

  processChunk(chunk: Chunk): ProcessResult {
    this.drain(this.reassembler.push(chunk));
    return this.takeResult();
  }

  endStream(): ProcessResult {
    this.drain(this.reassembler.finish());
    const { phase, cursor, baseline, targeted } = this.store.getState();
    if (phase === "synchronizing" && cursor !== undefined) {
      for (const position of positionsBetween(baseline, cursor, Infinity)) {
        if (targeted.has(position)) continue;
        this.store.getState().markSynchronized(position, false);
        this.enqueueInsert(baseline.content.get(position) ?? "");
      }
      this.flush();
      this.logger.debug(`end of stream: synchronized through ${this.cursor}`);
    }
    return this.takeResult();
  }

  private drain(parsed: ParseResult): void {
    this.backlog.push(...parsed.records);
    this.report(parsed.issues);
    this.flush();
    for (let record = this.backlog.shift(); record !== undefined; record = this.backlog.shift()) {
      const issue = this.apply(record);
      if (issue) this.report([issue]);
      else this.held.applied.push(record);
      this.flush();
    }
  }

  /** Plans one record into the outbox; returns the issue when it has to be dropped. */
  private apply(record: UpdateRecord): SyncIssue | null {
    const { phase, cursor, baseline, targeted } = this.store.getState();

    if (phase === "awaiting_first_update" || cursor === undefined) {
      const edit = computeFirstEdit(baseline, record, this.config.unit);
      this.logger.debug(`first update at ${record.position}: delete ${edit.deleteCount}, insert ${JSON.stringify(edit.insertText)}`);
      this.store.getState().markSynchronized(record.position, true);
      this.outbox.push({ op: "delete", count: edit.deleteCount });
      this.enqueueInsert(edit.insertText);
      return null;
    }

    if (record.position <= cursor) {
      return { kind: "OutOfOrderPosition", position: record.position, cursor };
    }

    this.store.getState().markSynchronized(record.position, true);
    for (const position of positionsBetween(baseline, cursor, record.position)) {
      if (targeted.has(position)) continue;
      this.enqueueInsert(baseline.content.get(position) ?? "");
    }
    this.enqueueInsert(record.content);
    return null;
  }

  private enqueueInsert(text: string): void {
    if (text.length > 0) this.outbox.push({ op: "insert", text });
  }

  // An operation leaves the outbox only once the sink has taken it.
  private flush(): void {
    for (let op = this.outbox[0]; op !== undefined; op = this.outbox[0]) {
      if (op.op === "delete") {
        this.logger.debug(`delete ${op.count}`);
        this.sink.delete(op.count);
      } else {
        this.logger.debug(`insert ${JSON.stringify(op.text)}`);
        this.sink.insert(op.text);
      }
      this.outbox.shift();
    }
  }

  private report(issues: SyncIssue[]): void {
    for (const issue of issues) {
      this.logger.warn(describeIssue(issue));
      this.held.issues.push(issue);
    }
  }

  private takeResult(): ProcessResult {
    const result = this.held;
    this.held = { applied: [], issues: [] };
    return result;
  }
}
