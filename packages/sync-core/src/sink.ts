import type { SinkOp } from "./types";
import { SinkError } from "./errors";
import { charLength, splitChars, type CharUnit } from "./text";

/** The live surface: deletes before the caret and types at it. */
export interface OutputSink {
  delete(count: number): void;
  insert(text: string): void;
}

export function sinkFromFunctions(del: (count: number) => void, insert: (text: string) => void): OutputSink {
  return { delete: del, insert };
}

/** In-memory surface that keeps both the resulting text and every call. */
export class RecordingSink implements OutputSink {
  text: string;
  readonly ops: SinkOp[] = [];

  constructor(initialText = "", private readonly unit: CharUnit = "grapheme") {
    this.text = initialText;
  }

  delete(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new SinkError(`delete count must be a non-negative integer, got ${count}`);
    }
    const chars = splitChars(this.text, this.unit);
    if (count > chars.length) {
      throw new SinkError(`cannot delete ${count} characters from ${chars.length}`);
    }
    this.ops.push({ op: "delete", count });
    this.text = chars.slice(0, chars.length - count).join("");
  }

  insert(text: string): void {
    this.ops.push({ op: "insert", text });
    this.text += text;
  }

  get length(): number {
    return charLength(this.text, this.unit);
  }

  clear(): void {
    this.ops.length = 0;
  }
}
