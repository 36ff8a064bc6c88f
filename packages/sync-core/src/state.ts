import { createStore } from "zustand/vanilla";
import type { Position, SessionPhase } from "./types";
import { EMPTY_BASELINE, type Baseline } from "./baseline";

export type SessionState = {
  baseline: Baseline;
  phase: SessionPhase;
  cursor: Position | undefined;
  targeted: ReadonlySet<Position>;
  beginSession: (baseline: Baseline) => void;
  markSynchronized: (position: Position, isTarget: boolean) => void;
};

export function createSessionStore(baseline: Baseline = EMPTY_BASELINE) {
  // Owned by the current session and grown in place; replaced on beginSession.
  let targeted = new Set<Position>();
  return createStore<SessionState>((set) => ({
    baseline,
    phase: "awaiting_first_update",
    cursor: undefined,
    targeted,
    beginSession: (next) => {
      targeted = new Set();
      set({ baseline: next, phase: "awaiting_first_update", cursor: undefined, targeted });
    },
    markSynchronized: (position, isTarget) =>
      set((s) => {
        if (s.cursor !== undefined && position <= s.cursor) return {};
        if (isTarget) targeted.add(position);
        return { phase: "synchronizing", cursor: position, targeted };
      })
  }));
}

export type SessionStore = ReturnType<typeof createSessionStore>;
