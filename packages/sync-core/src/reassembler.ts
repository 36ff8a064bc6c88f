import type { Chunk, ParseResult, Position, SyncIssue, UpdateRecord } from "./types";
import { DEFAULT_CONFIG, type SyncConfig } from "./config";
import { decodeEntities } from "./entities";

type ReassemblerOptions = Pick<SyncConfig, "noise" | "mismatch" | "decodeEntities" | "maxMarkerLength">;

type LexState =
  | { mode: "outside" }
  | { mode: "content"; id: Position; text: string };

const openRe = /^<(\d+)>$/;
const closeRe = /^<\/(\d+)>$/;
const numericMarkerPrefixRe = /^<\/?\d*$/;

function parseId(digits: string): Position | null {
  const id = Number(digits);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * Rebuilds `<N>content</N>` records from chunks split at arbitrary points.
 *
 * Input is lexed one UTF-16 code unit at a time into state that survives
 * across `push` calls, so the records produced never depend on where the
 * chunk boundaries fell. Byte chunks go through a streaming UTF-8 decoder
 * first; an incomplete sequence at the end of a chunk stays in the decoder
 * until more bytes arrive, or is flushed (as U+FFFD) by a string chunk.
 */
export class FragmentReassembler {
  private readonly options: ReassemblerOptions;
  private decoder = new TextDecoder("utf-8");
  private state: LexState = { mode: "outside" };
  private marker: string | null = null;
  private noise = "";
  private records: UpdateRecord[] = [];
  private issues: SyncIssue[] = [];

  constructor(options: Partial<ReassemblerOptions> = {}) {
    this.options = { ...DEFAULT_CONFIG, ...options };
  }

  reset(): void {
    this.decoder = new TextDecoder("utf-8");
    this.state = { mode: "outside" };
    this.marker = null;
    this.noise = "";
    this.records = [];
    this.issues = [];
  }

  /** Raw text held while waiting for the rest of a marker or record. */
  get pending(): string {
    const body = this.state.mode === "content" ? `<${this.state.id}>${this.state.text}` : "";
    return body + (this.marker ?? "");
  }

  push(chunk: Chunk): ParseResult {
    // A string chunk ends any byte sequence still held: bytes first, in order.
    const text = typeof chunk === "string" ? this.decoder.decode() + chunk : this.decoder.decode(chunk, { stream: true });
    for (let i = 0; i < text.length; i++) this.feed(text[i]);
    return this.drain();
  }

  /** Closes the sequence: anything still open is malformed. */
  finish(): ParseResult {
    const tail = this.decoder.decode();
    for (let i = 0; i < tail.length; i++) this.feed(tail[i]);

    if (this.state.mode === "content") {
      this.malformed({ kind: "MalformedMarker", reason: "unterminated", id: this.state.id }, this.state.id);
    } else if (this.marker !== null && this.marker.length > 1 && numericMarkerPrefixRe.test(this.marker)) {
      this.issues.push({ kind: "MalformedMarker", reason: "unterminated" });
    }
    this.state = { mode: "outside" };
    this.marker = null;
    return this.drain();
  }

  private feed(ch: string): void {
    if (this.marker === null) {
      if (ch === "<") this.marker = "<";
      else if (this.state.mode === "content") this.state.text += ch;
      else this.noise += ch;
      return;
    }

    if (ch === ">") {
      const raw = this.marker + ch;
      this.marker = null;
      this.resolveMarker(raw);
      return;
    }

    const next = this.marker + ch;
    if (this.state.mode === "content") {
      if (!numericMarkerPrefixRe.test(next) || next.length >= this.options.maxMarkerLength) {
        // Not a marker after all: the "<" was literal text.
        this.state.text += this.marker;
        this.marker = null;
        this.feed(ch);
        return;
      }
      this.marker = next;
      return;
    }

    if (ch === "<") {
      // Whatever was collected never closed; it cannot be a marker now.
      this.noise += this.marker;
      this.marker = "<";
    } else if (next.length >= this.options.maxMarkerLength) {
      if (numericMarkerPrefixRe.test(next)) this.issues.push({ kind: "MalformedMarker", reason: "marker_too_long" });
      else this.noise += next;
      this.marker = null;
    } else {
      this.marker = next;
    }
  }

  private resolveMarker(raw: string): void {
    const open = openRe.exec(raw);
    const close = closeRe.exec(raw);
    const openId = open ? parseId(open[1]) : null;
    const closeId = close ? parseId(close[1]) : null;

    if ((open && openId === null) || (close && closeId === null)) {
      this.issues.push({ kind: "MalformedMarker", reason: "marker_too_long" });
      return;
    }

    if (this.state.mode === "outside") {
      if (openId !== null) {
        this.state = { mode: "content", id: openId, text: "" };
      } else if (closeId !== null) {
        this.issues.push({ kind: "MalformedMarker", reason: "stray_close", closeId });
      }
      // Any other tag is envelope (<update>, <reset/>, ...) and is dropped.
      return;
    }

    const { id, text } = this.state;
    if (closeId === id) {
      this.records.push({ position: id, content: this.options.decodeEntities ? decodeEntities(text) : text });
      this.state = { mode: "outside" };
    } else if (closeId !== null) {
      this.malformed({ kind: "MalformedMarker", reason: "mismatched_close", id, closeId }, id);
      this.state = { mode: "outside" };
    } else if (openId !== null) {
      this.malformed({ kind: "MalformedMarker", reason: "open_before_close", id }, id);
      this.state = { mode: "content", id: openId, text: "" };
    } else {
      this.state.text += raw;
    }
  }

  private malformed(issue: SyncIssue, id: Position): void {
    this.issues.push(issue);
    if (this.options.mismatch === "blank") this.records.push({ position: id, content: "" });
  }

  private drain(): ParseResult {
    if (this.options.noise === "report" && this.noise.trim() !== "") {
      this.issues.push({ kind: "ProtocolNoise", text: this.noise });
    }
    this.noise = "";
    const out = { records: this.records, issues: this.issues };
    this.records = [];
    this.issues = [];
    return out;
  }
}

/** Lazily yields the records carried by a finite sequence of chunks. */
export function* reassemble(chunks: Iterable<Chunk>, options: Partial<ReassemblerOptions> = {}): Generator<UpdateRecord> {
  const reassembler = new FragmentReassembler(options);
  for (const chunk of chunks) yield* reassembler.push(chunk).records;
  yield* reassembler.finish().records;
}
