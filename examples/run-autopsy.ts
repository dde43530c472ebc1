// examples/run-autopsy.ts
//
// Register a CSV, build a 1 Hz overview, run Pass 1 twice (second call is a
// cache hit) and print the surfaced windows.
//
//   tsx examples/run-autopsy.ts [file.csv] [--cache <dir>]
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { AutopsyStore } from "../packages/autopsy/src/index.js";

function arg(name: string): string | null {
  const i = process.argv.indexOf(name);
  if (i < 0) return null;
  return process.argv[i + 1] ?? null;
}

function writeDemoCsv(file: string) {
  const rows = ["timestamp,speed,coolant_temp"];
  for (let t = 0; t < 120; t++) {
    const speed = 20 <= t && t < 35 ? 42 : 40 + (t % 5);
    const temp = (t >= 80 ? 110 : 90) + (t % 3);
    rows.push(`${t},${speed},${temp}`);
    rows.push(`${t + 0.5},${speed + (20 <= t && t < 35 ? 0 : 1)},${temp + 0.5}`);
  }
  fs.writeFileSync(file, rows.join("\n") + "\n", "utf8");
}

function main() {
  const workDir = fs.mkdtempSync(path.join(os.tmpdir(), "autopsy-demo-"));
  const csv = process.argv[2] && !process.argv[2].startsWith("--") ? process.argv[2] : path.join(workDir, "demo.csv");
  if (!fs.existsSync(csv)) writeDemoCsv(csv);

  const store = new AutopsyStore({ root: arg("--cache") ?? path.join(workDir, ".autopsy_cache") });
  const ref = store.add(csv, "demo run");
  console.log("registered", ref);

  const overview = store.buildOverview(ref.id, { hz: 1 });
  console.log("overview", { key: overview.key, cache_hit: overview.cache_hit, path: overview.path });

  const pass1Cfg = { flatline_min_run: 10, spike_mad_z: 5 };
  const first = store.runPass1(ref.id, { hz: 1 }, pass1Cfg);
  const second = store.runPass1(ref.id, { hz: 1 }, pass1Cfg);
  console.log("pass1", { key: first.key, first_cache_hit: first.cache_hit, second_cache_hit: second.cache_hit });

  console.log(JSON.stringify(store.summarize(second), null, 2));
}

main();
