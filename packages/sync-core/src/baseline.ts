import type { Position } from "./types";
import { BaselineError } from "./errors";
import { escapeEntities } from "./entities";

export type BaselineInput = ReadonlyMap<Position, string> | Readonly<Record<string, string>>;

/** Immutable snapshot of the text on the surface when a session starts. */
export type Baseline = {
  readonly positions: readonly Position[]; // ascending
  readonly content: ReadonlyMap<Position, string>;
};

export const EMPTY_BASELINE: Baseline = { positions: [], content: new Map() };

function toPosition(key: string | number): Position {
  const position = typeof key === "number" ? key : /^\d+$/.test(key) ? Number(key) : NaN;
  if (!Number.isSafeInteger(position) || position < 0) {
    throw new BaselineError(`baseline position must be a non-negative integer, got ${JSON.stringify(key)}`);
  }
  return position;
}

export function isPositionMap(input: BaselineInput): input is ReadonlyMap<Position, string> {
  return input instanceof Map;
}

export function createBaseline(input: BaselineInput): Baseline {
  const entries: Array<[string | number, unknown]> = isPositionMap(input) ? [...input.entries()] : Object.entries(input);
  const content = new Map<Position, string>();
  for (const [key, value] of entries) {
    const position = toPosition(key);
    if (typeof value !== "string") {
      throw new BaselineError(`baseline content at ${position} must be a string`);
    }
    content.set(position, value);
  }
  const positions = [...content.keys()].sort((a, b) => a - b);
  return { positions, content };
}

export function baselineText(baseline: Baseline, through = Infinity): string {
  let out = "";
  for (const position of baseline.positions) {
    if (position > through) break;
    out += baseline.content.get(position) ?? "";
  }
  return out;
}

/** Positions strictly inside (after, before), ascending. */
export function positionsBetween(baseline: Baseline, after: Position, before: Position): Position[] {
  const { positions } = baseline;
  let lo = 0;
  let hi = positions.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (positions[mid] <= after) lo = mid + 1;
    else hi = mid;
  }
  const out: Position[] = [];
  for (let i = lo; i < positions.length && positions[i] < before; i++) out.push(positions[i]);
  return out;
}

export function baselineFromText(text: string, step = 10): Baseline {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  const content = new Map<Position, string>();
  words.forEach((word, i) => {
    content.set((i + 1) * step, i < words.length - 1 ? `${word} ` : word);
  });
  return { positions: [...content.keys()], content };
}

/** The `<N>content</N>` form the text generator is given as context. */
export function baselineToMarkup(baseline: Baseline): string {
  return baseline.positions
    .map((p) => `<${p}>${escapeEntities(baseline.content.get(p) ?? "")}</${p}>`)
    .join("");
}
