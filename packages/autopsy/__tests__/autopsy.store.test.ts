import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DataShapeError, InvalidConfigError, NotFoundError, UnsupportedFormatError } from "../../core/src/errors.js";
import { silentLogger } from "../../core/src/logger.js";
import { listFiles, makeTmpDir, removeTmpDir } from "../../store/__tests__/_helpers/tmp-dir.js";
import { AutopsyStore } from "../src/autopsy-store.js";

const NOW = "2024-05-01T12:00:00.000Z";
const B_SPIKE = 0.6745 * 1001;

/**
 * Two rows per second for 60 s.
 * signal_a: ramps, but holds at 5 for seconds 20..29 (zero spread).
 * signal_b: period-3 jitter around 0/1/3 with a +1000 level step at 50.
 */
function driveCsv(): string {
  const lines = ["timestamp,signal_a,signal_b"];
  for (let i = 0; i < 60; i++) {
    const flat = i >= 20 && i <= 29;
    const b = [0, 1, 3][i % 3] + (i >= 50 ? 1000 : 0);
    lines.push(`${i},${flat ? 5 : i},${b - 0.25}`);
    lines.push(`${i + 0.5},${flat ? 5 : i + 0.5},${b + 0.25}`);
  }
  return lines.join("\n") + "\n";
}

describe("AutopsyStore", () => {
  let dir: string;
  let store: AutopsyStore;
  let csv: string;

  beforeEach(() => {
    dir = makeTmpDir();
    store = new AutopsyStore({ root: path.join(dir, "cache"), head_bytes: 4096, logger: silentLogger, now: () => NOW });
    csv = path.join(dir, "drive.csv");
    fs.writeFileSync(csv, driveCsv());
  });

  afterEach(() => removeTmpDir(dir));

  const overviewCfg = { signals: ["signal_a", "signal_b"], hz: 1 };
  const pass1Cfg = { missing_rate: 0.1, flatline_eps: 0.01, flatline_min_run: 10, spike_mad_z: 5 };

  it("finds the flatline and the level step end to end", () => {
    const { id } = store.add(csv, "drive");
    const result = store.runPass1(id, overviewCfg, pass1Cfg);

    expect(result.cache_hit).toBe(false);
    expect(result.measurement_id).toBe(id);
    expect(result.created_at).toBe(NOW);

    expect(result.windows.map((w) => [w.start_bucket, w.end_bucket])).toEqual([
      [20, 29],
      [50, 50],
    ]);
    expect(result.windows[0].score).toBeCloseTo(10 + B_SPIKE, 6);
    expect(result.windows[0].signals.map((s) => s.signal)).toEqual(["signal_b", "signal_a"]);
    expect(result.windows[1].score).toBeCloseTo(1 + B_SPIKE, 6);
    expect(result.windows[0].start_time).toBe(20);
    expect(result.windows[0].duration_buckets).toBe(10);

    expect(result.per_signal.signal_a).toMatchObject({
      missing_rate: 0,
      missing_rate_flagged: false,
      flatline_run_count: 1,
      flatline_max_run: 10,
      spike_mad_z_max: 0,
      flagged_bucket_count: 10,
    });
    expect(result.per_signal.signal_b.flagged_buckets).toEqual([50]);
    expect(result.per_signal.signal_b.spike_mad_z_max).toBeCloseTo(B_SPIKE, 6);

    expect(result.timestamp_checks).toEqual({
      monotonic: true,
      gap_count: 0,
      gap_indices: [],
      gap_buckets: [],
      expected_gap_seconds: 1,
    });
  });

  it("serves the second identical run from cache", () => {
    const { id } = store.add(csv);
    const first = store.runPass1(id, overviewCfg, pass1Cfg);
    const artifact = store.cachePath(id, "pass1", first.key, ".json");
    const mtime = fs.statSync(artifact).mtimeMs;

    const second = store.runPass1(id, overviewCfg, pass1Cfg);

    expect(second.cache_hit).toBe(true);
    expect(second).toEqual({ ...first, cache_hit: true });
    expect(fs.statSync(artifact).mtimeMs).toBe(mtime);
    expect(store.loadPass1(id, overviewCfg, pass1Cfg)).toEqual(second);
  });

  it("shares one artifact per key across store instances", () => {
    const { id } = store.add(csv);
    const first = store.runPass1(id, overviewCfg, pass1Cfg);

    const other = new AutopsyStore({ root: store.root, head_bytes: 4096, logger: silentLogger });
    expect(other.add(csv).id).toBe(id);
    expect(other.runPass1(id, overviewCfg, pass1Cfg)).toEqual({ ...first, cache_hit: true });

    const files = listFiles(store.root);
    expect(files.filter((f) => f.includes(`${path.sep}pass1${path.sep}`))).toHaveLength(1);
    expect(files.filter((f) => f.includes(`${path.sep}overview${path.sep}`))).toHaveLength(1);
  });

  it("builds the overview on demand and reuses it", () => {
    const { id } = store.add(csv);
    const built = store.buildOverview(id, overviewCfg);
    expect(built.cache_hit).toBe(false);

    store.runPass1(id, overviewCfg, pass1Cfg);
    expect(store.buildOverview(id, overviewCfg)).toEqual({ ...built, cache_hit: true });

    const table = store.loadOverview(id, built.key);
    expect(table.buckets).toHaveLength(60);
    expect(table.values.signal_a_mean[0]).toBe(0.25);
    expect(table.values.signal_b_mean[50]).toBe(1003);
    expect(store.loadOverview(id, overviewCfg)).toEqual(table);
  });

  it("infers signals when none are configured", () => {
    const { id } = store.add(csv);
    const inferred = store.runPass1(id, {}, pass1Cfg);
    const explicit = store.runPass1(id, overviewCfg, pass1Cfg);

    expect(inferred.key).not.toBe(explicit.key);
    expect(Object.keys(inferred.per_signal).sort()).toEqual(["signal_a", "signal_b"]);
    expect(inferred.windows).toEqual(explicit.windows);
  });

  it("tracks registrations and labels", () => {
    const ref = store.add(csv, "first");
    expect(store.add(csv, "renamed")).toEqual({ ...ref, label: "renamed" });
    expect(store.meta(ref.id).label).toBe("renamed");
    expect(store.list().map((m) => m.measurement_id)).toEqual([ref.id]);
  });

  it("surfaces the top windows through summarize", () => {
    const { id } = store.add(csv);
    const summary = store.summarize(store.runPass1(id, overviewCfg, { ...pass1Cfg, top_k_windows: 1, top_n_signals: 1 }));

    expect(summary.window_count).toBe(2);
    expect(summary.windows.map((w) => w.start_bucket)).toEqual([20]);
    expect(summary.windows[0].signals.map((s) => s.signal)).toEqual(["signal_b"]);
  });

  describe("failures", () => {
    it("rejects invalid configs before touching the cache", () => {
      const { id } = store.add(csv);
      expect(() => store.runPass1(id, { hz: 0 })).toThrow(InvalidConfigError);
      expect(() => store.runPass1(id, {}, { missing_rate: 2 })).toThrow(InvalidConfigError);
      expect(fs.existsSync(path.join(store.root, "artifacts"))).toBe(false);
    });

    it("fails on a missing signal without leaving a result behind", () => {
      const { id } = store.add(csv);
      let caught: unknown;
      try {
        store.runPass1(id, { signals: ["signal_a", "nope"] }, pass1Cfg);
      } catch (e) {
        caught = e;
      }

      expect(caught).toBeInstanceOf(DataShapeError);
      if (caught instanceof DataShapeError) expect(caught.column).toBe("nope");
      expect(() => store.loadPass1(id, { signals: ["signal_a", "nope"] }, pass1Cfg)).toThrow(NotFoundError);
    });

    it("reports unknown measurements and unsupported formats", () => {
      expect(() => store.runPass1("m_000000000000")).toThrow(NotFoundError);

      const mf4 = path.join(dir, "log.mf4");
      fs.writeFileSync(mf4, Buffer.alloc(128));
      const { id } = store.add(mf4);
      expect(() => store.runPass1(id)).toThrow(UnsupportedFormatError);
    });

    it("loads nothing that was not computed", () => {
      const { id } = store.add(csv);
      expect(() => store.loadPass1(id, overviewCfg, pass1Cfg)).toThrow(NotFoundError);
      expect(() => store.loadOverview(id, overviewCfg)).toThrow(NotFoundError);
    });
  });
});

describe("AutopsyStore with datetime logs", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTmpDir();
  });

  afterEach(() => removeTmpDir(dir));

  it("presents windows in ISO time", () => {
    const lines = ["time,temp"];
    // flat at 70 for the first 10 s, then a 1 degree spread within each second
    for (let i = 0; i < 12; i++) {
      lines.push(`${new Date(Date.UTC(2024, 0, 1, 0, 0, i)).toISOString()},70`);
      lines.push(`${new Date(Date.UTC(2024, 0, 1, 0, 0, i, 500)).toISOString()},${i < 10 ? 70 : 71}`);
    }
    const csv = path.join(dir, "temps.csv");
    fs.writeFileSync(csv, lines.join("\n") + "\n");

    const store = new AutopsyStore({ root: path.join(dir, "cache"), head_bytes: 4096, logger: silentLogger });
    const { id } = store.add(csv);
    const result = store.runPass1(id, { time_col: "time" }, { flatline_min_run: 10 });

    expect(store.loadOverview(id, { time_col: "time" }).time_kind).toBe("datetime");
    expect(result.windows).toHaveLength(1);
    expect(result.windows[0].start_time).toBe("2024-01-01T00:00:00.000Z");
    expect(result.windows[0].end_time).toBe("2024-01-01T00:00:09.000Z");
    expect(result.windows[0].start_bucket).toBe(1_704_067_200);
  });
});

describe("AutopsyStore with case-sensitive headers", () => {
  let dir: string;
  let store: AutopsyStore;

  beforeEach(() => {
    dir = makeTmpDir();
    store = new AutopsyStore({ root: path.join(dir, "cache"), head_bytes: 4096, logger: silentLogger });
  });

  afterEach(() => removeTmpDir(dir));

  function register(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return store.add(file).id;
  }

  it("keeps signals whose names differ only in case apart", () => {
    const id = register("cased.csv", "timestamp,Speed,speed\n0,1,10\n1,2,20\n");

    expect(store.buildOverview(id).cache_hit).toBe(false);
    const table = store.loadOverview(id);

    expect(table.signals).toEqual(["Speed", "speed"]);
    expect(table.values.Speed_mean).toEqual([1, 2]);
    expect(table.values.speed_mean).toEqual([10, 20]);
    expect(Object.keys(store.runPass1(id).per_signal)).toEqual(["Speed", "speed"]);
  });

  it("accepts a time column named Bucket", () => {
    const id = register("bucketed.csv", "Bucket,temp\n0,70\n1,71\n");

    store.buildOverview(id, { time_col: "Bucket" });
    const table = store.loadOverview(id, { time_col: "Bucket" });

    expect(table.time_col).toBe("Bucket");
    expect(table.buckets).toEqual([0, 1]);
    expect(table.signals).toEqual(["temp"]);
    expect(table.values.temp_mean).toEqual([70, 71]);
  });
});
