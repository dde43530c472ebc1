import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { isAutopsyError } from "../../core/src/errors.js";
import { fingerprintFile, readHead } from "../src/fingerprint.js";
import { makeTmpDir, removeTmpDir } from "./_helpers/tmp-dir.js";

describe("fingerprintFile", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = makeTmpDir();
    file = path.join(dir, "log.csv");
    fs.writeFileSync(file, "timestamp,a\n0,1\n1,2\n2,3\n");
  });

  afterEach(() => removeTmpDir(dir));

  /** Rewrite the file in place, then put its mtime back. */
  function rewriteKeepingMtime(content: string) {
    const before = fs.statSync(file);
    fs.writeFileSync(file, content);
    fs.utimesSync(file, before.atime, before.mtime);
  }

  it("is stable for an untouched file", () => {
    expect(fingerprintFile(file, 16)).toBe(fingerprintFile(file, 16));
    expect(fingerprintFile(file)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("changes when the size changes", () => {
    const a = fingerprintFile(file, 16);
    rewriteKeepingMtime("timestamp,a\n0,1\n1,2\n2,3\n3,4\n");
    expect(fingerprintFile(file, 16)).not.toBe(a);
  });

  it("changes when the head changes at the same size and mtime", () => {
    const a = fingerprintFile(file, 16);
    rewriteKeepingMtime("timestamp,b\n0,1\n1,2\n2,3\n");
    expect(fingerprintFile(file, 16)).not.toBe(a);
  });

  it("misses a change past the head window at the same size and mtime", () => {
    const a = fingerprintFile(file, 16);
    rewriteKeepingMtime("timestamp,a\n0,1\n1,2\n2,9\n");
    expect(fingerprintFile(file, 16)).toBe(a);
  });

  it("changes when only the mtime moves by whole seconds", () => {
    const a = fingerprintFile(file, 16);
    const st = fs.statSync(file);
    fs.utimesSync(file, st.atime, new Date(st.mtimeMs + 5000));
    expect(fingerprintFile(file, 16)).not.toBe(a);
  });

  it("reports a missing file as IO_ERROR", () => {
    expect(() => fingerprintFile(path.join(dir, "absent.csv"))).toThrow(/^IO_ERROR: cannot read/);
    expect(() => fingerprintFile(dir)).toThrow(/not a regular file/);

    let caught: unknown;
    try {
      fingerprintFile(path.join(dir, "absent.csv"));
    } catch (e) {
      caught = e;
    }
    expect(isAutopsyError(caught, "IO_ERROR")).toBe(true);
  });

  it("reads at most the requested head", () => {
    expect(readHead(file, 9).toString("utf8")).toBe("timestamp");
    expect(readHead(file, 1000).length).toBe(fs.statSync(file).size);
  });
});
