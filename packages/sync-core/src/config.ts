import { z } from "zod";

export const SyncConfigSchema = z.object({
  noise: z.enum(["ignore", "report"]),
  mismatch: z.enum(["discard", "blank"]),
  decodeEntities: z.boolean(),
  unit: z.enum(["grapheme", "codepoint"]),
  maxMarkerLength: z.number().int().min(3),
  debug: z.boolean()
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;

export const DEFAULT_CONFIG: SyncConfig = {
  noise: "ignore",
  mismatch: "discard",
  decodeEntities: true,
  unit: "grapheme",
  maxMarkerLength: 32,
  debug: false
};

export function resolveConfig(overrides: Partial<SyncConfig> = {}): SyncConfig {
  return SyncConfigSchema.parse({ ...DEFAULT_CONFIG, ...overrides });
}
