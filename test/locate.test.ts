import { afterEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { locateBundle } from "../src/bundle/locate.js";
import { locate } from "../src/commands/locate.js";
import { makeTempDir, writeFiles } from "./fixtures.js";

const NAMES = ["cdf-meta.json", "composition-cdf.json"];

describe("bundle locator", () => {
  let root: string;

  afterEach(() => {
    if (root) fs.rmSync(root, { recursive: true, force: true });
  });

  it("uses an explicit directory as given", () => {
    root = makeTempDir();
    writeFiles(root, { "bundle/cdf-meta.json": "{}", "empty/.keep": "" });

    expect(locateBundle(path.join(root, "bundle"), root, NAMES)).toBe(path.join(root, "bundle"));
    expect(locateBundle(path.join(root, "empty"), root, NAMES)).toBe(path.join(root, "empty"));
  });

  it("uses the parent of an explicit manifest file", () => {
    root = makeTempDir();
    writeFiles(root, { "bundle/cdf-meta.json": "{}" });

    expect(locateBundle(path.join(root, "bundle", "cdf-meta.json"), root, NAMES)).toBe(path.join(root, "bundle"));
  });

  it("returns null for an explicit path that does not exist", () => {
    root = makeTempDir();

    expect(locateBundle(path.join(root, "nope"), root, NAMES)).toBeNull();
  });

  it("searches breadth-first for the shallowest bundle", () => {
    root = makeTempDir();
    writeFiles(root, { "a/deep/cdf-meta.json": "{}", "z/composition-cdf.json": "{}" });

    expect(locateBundle(undefined, root, NAMES)).toBe(path.join(root, "z"));
  });

  it("prefers the search root itself", () => {
    root = makeTempDir();
    writeFiles(root, { "cdf-meta.json": "{}", "a/cdf-meta.json": "{}" });

    expect(locateBundle(undefined, root, NAMES)).toBe(root);
  });

  it("does not search node_modules or .git", () => {
    root = makeTempDir();
    writeFiles(root, { "node_modules/pkg/cdf-meta.json": "{}", ".git/cdf-meta.json": "{}" });

    expect(locateBundle(undefined, root, NAMES)).toBeNull();
  });
});

describe("locate command", () => {
  let root: string;

  afterEach(() => {
    if (root) fs.rmSync(root, { recursive: true, force: true });
  });

  it("reports the bundle and manifest relative to the working directory", () => {
    root = makeTempDir();
    writeFiles(root, { "infra/composition-cdf.json": "{}" });

    expect(locate({ cwd: root, env: {} })).toEqual({ ok: true, bundleRoot: "infra", manifestFile: "composition-cdf.json" });
  });

  it("fails when nothing is found", () => {
    root = makeTempDir();

    const res = locate({ cwd: root, env: {} });

    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe("BUNDLE_NOT_FOUND");
  });
});
