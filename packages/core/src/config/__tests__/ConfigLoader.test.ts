import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig, normalizeConfigSource } from "../ConfigLoader.js";

test("loadConfig merges cli over env over file", { concurrency: false }, async () => {
  const tmpDir = mkdtempSync(path.join(os.tmpdir(), "ciplan-config-"));
  writeFileSync(
    path.join(tmpDir, "ciplan.config.yaml"),
    [
      "workspaceRoot: /file",
      "platform: windows",
      "configuration: Debug",
      "artifact:",
      "  dir: build",
      "  executable: host.exe",
      "experimentalFeatures:",
      "  PSFeatureA: []",
      "  PSFeatureB:",
      "    - test/b.tests.ps1",
      "release:",
      "  nextReleaseTag: v7.5.0-preview.3",
      "",
    ].join("\n"),
  );

  const config = await loadConfig({
    cwd: tmpDir,
    env: {
      CIPLAN_WORKSPACE_ROOT: "/env",
      CIPLAN_PLATFORM: "linux",
      CIPLAN_ARTIFACT_DIR: "env-out",
      BUILD_BUILDID: "4711",
    },
    cli: { workspaceRoot: "cli-root", privilegeMode: "elevated" },
  });

  assert.equal(config.workspaceRoot, path.resolve(tmpDir, "cli-root"));
  assert.equal(config.platform, "linux");
  assert.equal(config.privilegeMode, "elevated");
  assert.equal(config.configuration, "Debug");
  assert.deepEqual(config.artifact, { dir: "env-out", path: undefined, executable: "host.exe" });
  assert.deepEqual(config.experimentalFeatures, { PSFeatureA: [], PSFeatureB: ["test/b.tests.ps1"] });
  assert.deepEqual(config.release, { nextReleaseTag: "v7.5.0-preview.3", buildId: "4711" });
});

test("loadConfig falls back to defaults", { concurrency: false }, async () => {
  const tmpDir = mkdtempSync(path.join(os.tmpdir(), "ciplan-config-"));
  const config = await loadConfig({ cwd: tmpDir, env: {} });
  assert.equal(config.workspaceRoot, tmpDir);
  assert.equal(config.privilegeMode, "all");
  assert.equal(config.configuration, "Release");
  assert.equal(config.featureTagPattern, "\\[feature\\]");
  assert.equal(config.variableStore, "auto");
  assert.deepEqual(config.variables, { dailyBuild: "CIPLAN_DAILY_BUILD", testsPassed: "CIPLAN_TESTS_PASSED" });
  assert.deepEqual(config.tests, { root: "test", metadataPath: "test/tools/TestMetadata.json" });
  assert.deepEqual(config.logging, { enabled: true, dir: ".ciplan/runs" });
  assert.equal(config.experimentalFeatures, undefined);
});

test("loadConfig reads a JSON config through an explicit path", { concurrency: false }, async () => {
  const tmpDir = mkdtempSync(path.join(os.tmpdir(), "ciplan-config-"));
  writeFileSync(path.join(tmpDir, "custom.json"), JSON.stringify({ logging: { enabled: false }, variableStore: "github" }));
  const config = await loadConfig({ cwd: tmpDir, env: {}, configPath: "custom.json" });
  assert.equal(config.logging.enabled, false);
  assert.equal(config.logging.dir, ".ciplan/runs");
  assert.equal(config.variableStore, "github");
});

test("loadConfig rejects a missing explicit config file", { concurrency: false }, async () => {
  const tmpDir = mkdtempSync(path.join(os.tmpdir(), "ciplan-config-"));
  await assert.rejects(
    loadConfig({ cwd: tmpDir, env: {}, configPath: "absent.yaml" }),
    new RegExp(`Config file not found: ${path.join(tmpDir, "absent.yaml").replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}`),
  );
});

test("normalizeConfigSource lists every invalid key", () => {
  assert.throws(
    () =>
      normalizeConfigSource({
        platform: "beos",
        logging: { enabled: "yes" },
        experimentalFeatures: { A: "test/a.ps1" },
        artifact: [],
      }),
    {
      message:
        "Invalid config values: config.platform (expected windows|linux|macos), config.experimentalFeatures.A (expected list of test files), config.artifact (expected object), config.logging.enabled (expected boolean)",
    },
  );
});

test("loadConfig rejects invalid environment and derived values", { concurrency: false }, async () => {
  const tmpDir = mkdtempSync(path.join(os.tmpdir(), "ciplan-config-"));
  await assert.rejects(
    loadConfig({ cwd: tmpDir, env: { CIPLAN_PLATFORM: "solaris", CIPLAN_LOGGING: "maybe" } }),
    { message: "Invalid environment values: CIPLAN_PLATFORM, CIPLAN_LOGGING" },
  );
  await assert.rejects(
    loadConfig({
      cwd: tmpDir,
      env: { CIPLAN_FEATURE_TAG_PATTERN: "[feature", CIPLAN_NEXT_RELEASE_TAG: "7.5.0" },
    }),
    { message: "Invalid config values: featureTagPattern, release.nextReleaseTag" },
  );
});
