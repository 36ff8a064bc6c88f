import { FragmentReassembler } from "../src/reassembler";

const wire = Array.from({ length: 2000 }, (_, i) => `<${i * 10}>w&amp;${i} </${i * 10}>`).join("");
const r = new FragmentReassembler();

let records = 0;
const t0 = performance.now();
for (let i = 0; i < 20; i++) {
  r.reset();
  for (let j = 0; j < wire.length; j += 5) records += r.push(wire.slice(j, j + 5)).records.length;
}
const dt = performance.now() - t0;
console.log(`bench_reassembler ms: ${dt.toFixed(2)} (${records} records)`);
