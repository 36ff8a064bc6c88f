import { SyncEngine } from "../src/engine";
import { sinkFromFunctions } from "../src/sink";
import { baselineFromText } from "../src/baseline";
import { silentLogger } from "../src/log";

const words = Array.from({ length: 400 }, (_, i) => `word${i}`).join(" ");
const baseline = baselineFromText(words);
const wire = baseline.positions.filter((p) => p % 30 === 0).map((p) => `<${p}>changed${p} </${p}>`).join("");

let typed = 0;
const engine = new SyncEngine(sinkFromFunctions(() => {}, (text) => { typed += text.length; }), { logger: silentLogger });

const t0 = performance.now();
for (let i = 0; i < 200; i++) {
  engine.reset(baseline);
  for (let j = 0; j < wire.length; j += 7) engine.processChunk(wire.slice(j, j + 7));
  engine.endStream();
}
const dt = performance.now() - t0;
console.log(`bench_engine ms: ${dt.toFixed(2)} (typed ${typed} chars)`);
