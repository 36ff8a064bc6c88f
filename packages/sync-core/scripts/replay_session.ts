import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { SyncEngine, describeIssue } from "../src/engine";
import { RecordingSink } from "../src/sink";
import { baselineText, createBaseline } from "../src/baseline";
import { DEFAULT_CONFIG, type SyncConfig } from "../src/config";

type Config = {
  input: string;
  chunkSize: number; // 0 keeps the chunks as recorded
  sync: SyncConfig;
};

const SessionFileSchema = z.object({
  baseline: z.record(z.string()).default({}),
  chunks: z.array(z.string())
});

function parseArgs(): Config {
  const cfg: Config = { input: "", chunkSize: 0, sync: { ...DEFAULT_CONFIG } };
  for (const arg of process.argv.slice(2)) {
    const [key, value] = arg.split("=");
    if (!key) continue;
    switch (key) {
      case "--input":
        if (value) cfg.input = path.resolve(value);
        break;
      case "--chunk-size":
        cfg.chunkSize = Math.max(0, Number(value) || 0);
        break;
      case "--report-noise":
        cfg.sync.noise = "report";
        break;
      case "--blank-mismatch":
        cfg.sync.mismatch = "blank";
        break;
      case "--debug":
        cfg.sync.debug = true;
        break;
      default:
        break;
    }
  }
  return cfg;
}

function rechunk(chunks: string[], size: number): string[] {
  if (size <= 0) return chunks;
  const wire = chunks.join("");
  const out: string[] = [];
  for (let i = 0; i < wire.length; i += size) out.push(wire.slice(i, i + size));
  return out;
}

async function main(): Promise<void> {
  const cfg = parseArgs();
  if (!cfg.input) {
    throw new Error("usage: replay_session --input=session.json [--chunk-size=N] [--report-noise] [--blank-mismatch] [--debug]");
  }

  const session = SessionFileSchema.parse(JSON.parse(await fs.readFile(cfg.input, "utf8")));
  const baseline = createBaseline(session.baseline);
  const sink = new RecordingSink(baselineText(baseline), cfg.sync.unit);
  const engine = new SyncEngine(sink, { config: cfg.sync });
  engine.reset(baseline);

  const chunks = rechunk(session.chunks, cfg.chunkSize);
  let records = 0;
  let issues = 0;
  for (const chunk of chunks) {
    const result = engine.processChunk(chunk);
    records += result.applied.length;
    issues += result.issues.length;
  }
  const end = engine.endStream();
  records += end.applied.length;
  issues += end.issues.length;

  for (const op of sink.ops) {
    console.log(op.op === "delete" ? `[replay] delete ${op.count}` : `[replay] insert ${JSON.stringify(op.text)}`);
  }
  console.log(`[replay] chunks: ${chunks.length}, records: ${records}, issues: ${issues}`);
  console.log(`[replay] final: ${JSON.stringify(sink.text)}`);
  for (const issue of end.issues) console.log(`[replay] ${describeIssue(issue)}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
