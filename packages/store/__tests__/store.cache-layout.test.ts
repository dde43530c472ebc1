import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { InvalidConfigError } from "../../core/src/errors.js";
import { cachePath, metaPath } from "../src/cache-layout.js";
import { makeTmpDir, removeTmpDir } from "./_helpers/tmp-dir.js";

describe("cache layout", () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpDir();
  });

  afterEach(() => removeTmpDir(root));

  it("derives artifact paths from id, kind and key", () => {
    const p = cachePath(root, "m_0123456789ab", "overview", "00ff00ff00ff00ff", ".sqlite");
    expect(p).toBe(path.join(root, "artifacts", "m_0123456789ab", "overview", "00ff00ff00ff00ff.sqlite"));
    expect(cachePath(root, "m_0123456789ab", "overview", "00ff00ff00ff00ff", ".sqlite")).toBe(p);
  });

  it("places metadata under meta/", () => {
    expect(metaPath(root, "m_0123456789ab")).toBe(path.join(root, "meta", "m_0123456789ab.json"));
  });

  it("does not create anything on disk", () => {
    cachePath(root, "m_0123456789ab", "pass1", "k", ".json");
    expect(fs.readdirSync(root)).toEqual([]);
  });

  it("rejects segments that would escape the layout", () => {
    expect(() => cachePath(root, "..", "overview", "k", "")).toThrow(InvalidConfigError);
    expect(() => cachePath(root, "m_1", "a/b", "k", "")).toThrow(/kind must be a plain path segment/);
    expect(() => metaPath(root, "")).toThrow(InvalidConfigError);
  });

  it("rejects malformed suffixes", () => {
    expect(() => cachePath(root, "m_1", "overview", "k", "sqlite")).toThrow(/cache suffix/);
    expect(() => cachePath(root, "m_1", "overview", "k", "./x")).toThrow(/cache suffix/);
  });
});
