import type { SyncConfig } from "./config";

export type CharUnit = SyncConfig["unit"];

const graphemeSegmenter = (() => {
  try {
    return new Intl.Segmenter(undefined, { granularity: "grapheme" });
  } catch {
    // Fallback for runtimes built without full ICU: code points only.
    return null;
  }
})();

function isAsciiText(text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) > 0x7f) return false;
  }
  return true;
}

export function splitChars(text: string, unit: CharUnit): string[] {
  if (isAsciiText(text)) return text.split("");
  if (unit === "grapheme" && graphemeSegmenter) {
    return Array.from(graphemeSegmenter.segment(text), (s) => s.segment);
  }
  return Array.from(text);
}

export function charLength(text: string, unit: CharUnit): number {
  return splitChars(text, unit).length;
}

export type CommonPrefix = {
  chars: number; // in logical characters
  offset: number; // in UTF-16 code units, always on a character boundary
};

export function commonPrefix(a: string, b: string, unit: CharUnit): CommonPrefix {
  const left = splitChars(a, unit);
  const right = splitChars(b, unit);
  const max = Math.min(left.length, right.length);
  let chars = 0;
  let offset = 0;
  while (chars < max && left[chars] === right[chars]) {
    offset += left[chars].length;
    chars += 1;
  }
  return { chars, offset };
}
