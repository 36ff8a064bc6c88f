import type { UpdateRecord } from "./types";
import { baselineText, type Baseline } from "./baseline";
import { charLength, commonPrefix, type CharUnit } from "./text";

export type FirstEdit = {
  visible: string;
  target: string;
  deleteCount: number;
  insertText: string;
};

/**
 * The one corrective edit of a session.
 *
 * `visible` is everything the baseline put on the surface, since typing
 * happens at its end; `target` is the text through the record's position
 * with the record applied. Later positions are retyped by gap fill or flush.
 */
export function computeFirstEdit(baseline: Baseline, record: UpdateRecord, unit: CharUnit): FirstEdit {
  const visible = baselineText(baseline);
  let target = "";
  let placed = false;
  for (const position of baseline.positions) {
    if (position > record.position) break;
    if (position === record.position) {
      target += record.content;
      placed = true;
    } else {
      target += baseline.content.get(position) ?? "";
    }
  }
  if (!placed) target += record.content;

  const prefix = commonPrefix(visible, target, unit);
  return {
    visible,
    target,
    deleteCount: charLength(visible, unit) - prefix.chars,
    insertText: target.slice(prefix.offset)
  };
}
