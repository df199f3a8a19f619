/**
 * Tests for configuration loading.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigShapeError, mergeLimits, resolveConfig, validateConfigShape } from "./config.js";

describe("resolveConfig", () => {
  let tmpDir: string;
  let projectDir: string;
  let homeDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "lode-config-"));
    projectDir = path.join(tmpDir, "project");
    homeDir = path.join(tmpDir, "home");
    fs.mkdirSync(projectDir);
    fs.mkdirSync(path.join(homeDir, ".lode"), { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("falls back to the default", () => {
    const resolved = resolveConfig(projectDir, homeDir);
    assert.equal(resolved.source, "default");
    assert.equal(resolved.path, null);
    assert.deepEqual(resolved.config, { version: 1 });
  });

  it("prefers the project file over the user file", () => {
    fs.writeFileSync(path.join(projectDir, ".lodeconfig.json"), JSON.stringify({ version: 1, limits: { maxSteps: 10 } }));
    fs.writeFileSync(path.join(homeDir, ".lode", "config.json"), JSON.stringify({ version: 1, limits: { maxSteps: 99 } }));
    const resolved = resolveConfig(projectDir, homeDir);
    assert.equal(resolved.source, "project");
    assert.equal(resolved.path, path.join(projectDir, ".lodeconfig.json"));
    assert.deepEqual(resolved.config.limits, { maxSteps: 10 });
  });

  it("uses the user file when there is no project file", () => {
    fs.writeFileSync(path.join(homeDir, ".lode", "config.json"), JSON.stringify({ limits: { timeMs: 500 } }));
    const resolved = resolveConfig(projectDir, homeDir);
    assert.equal(resolved.source, "user");
    assert.deepEqual(resolved.config, { version: 1, limits: { timeMs: 500 } });
  });

  it("skips invalid files", () => {
    fs.writeFileSync(path.join(projectDir, ".lodeconfig.json"), "{ not json");
    fs.writeFileSync(path.join(homeDir, ".lode", "config.json"), JSON.stringify({ limits: { maxSteps: -1 } }));
    assert.equal(resolveConfig(projectDir, homeDir).source, "default");
  });
});

describe("validateConfigShape", () => {
  it("rejects non-objects", () => {
    assert.throws(() => validateConfigShape([]), ConfigShapeError);
    assert.throws(() => validateConfigShape(null), ConfigShapeError);
  });

  it("rejects malformed limits", () => {
    assert.throws(() => validateConfigShape({ limits: 5 }), ConfigShapeError);
    assert.throws(() => validateConfigShape({ limits: { maxCallDepth: 1.5 } }), ConfigShapeError);
  });

  it("ignores unknown limit keys", () => {
    assert.deepEqual(validateConfigShape({ version: 2, limits: { maxSteps: 3, other: 1 } }), {
      version: 2,
      limits: { maxSteps: 3 },
    });
  });
});

describe("mergeLimits", () => {
  it("lets explicit values win", () => {
    assert.deepEqual(mergeLimits({ maxSteps: 10, timeMs: 100 }, { maxSteps: 5 }), { maxSteps: 5, timeMs: 100 });
    assert.deepEqual(mergeLimits(undefined, { timeMs: 1 }), { timeMs: 1 });
  });
});
