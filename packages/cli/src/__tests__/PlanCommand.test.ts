import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { isCiPolicyError, planTestInvocations } from "@ciplan/core";
import { FakeArtifactLocator, FakeVcsClient, InMemoryVariableStore, MemoryRunLog } from "@ciplan/testing";
import { PlanCommand, parsePlanArgs, planRows } from "../commands/plan/PlanCommand.js";

const withWorkspace = async (fn: (dir: string) => Promise<void>): Promise<void> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "ciplan-plan-"));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
};

const collaborators = (locator = new FakeArtifactLocator()) => ({
  vcs: new FakeVcsClient(),
  variables: new InMemoryVariableStore(),
  artifactLocator: locator,
  log: new MemoryRunLog(),
});

describe("plan argument parsing", () => {
  it("parses platform, privilege mode and configuration", () => {
    const parsed = parsePlanArgs(["--platform", "windows", "--privilege-mode=elevated", "--configuration", "Debug"]);
    assert.equal(parsed.platform, "windows");
    assert.equal(parsed.privilegeMode, "elevated");
    assert.equal(parsed.configuration, "Debug");
  });

  it("rejects an unknown privilege mode", () => {
    assert.throws(() => parsePlanArgs(["--privilege-mode", "root"]), /Invalid --privilege-mode root/);
  });
});

describe("planRows", () => {
  it("renders tags and scope per invocation", () => {
    const specs = planTestInvocations({
      classification: { isDaily: false, reason: "None" },
      platform: "windows",
      privilegeMode: "all",
      experimentalFeatures: new Map([["FeatureA", ["a.tests.ps1"]]]),
    });
    assert.deepEqual(planRows(specs), [
      ["UnelevatedTests", "unelevated", "CI", "Feature,Scenario,Slow,RequireAdminOnWindows", "all tests"],
      ["FeatureA-UnelevatedTests", "unelevated", "CI", "Feature,Scenario,Slow,RequireAdminOnWindows", "a.tests.ps1"],
      ["ElevatedTests", "elevated", "RequireAdminOnWindows", "Feature,Scenario,Slow", "all tests"],
      ["FeatureA-ElevatedTests", "elevated", "RequireAdminOnWindows", "Feature,Scenario,Slow", "a.tests.ps1"],
    ]);
  });
});

describe("PlanCommand", () => {
  it("plans from the config file and the metadata file", async () => {
    await withWorkspace(async (dir) => {
      await fs.writeFile(
        path.join(dir, "ciplan.config.yaml"),
        ["platform: linux", "configuration: Release", "tests:", "  metadataPath: meta/TestMetadata.json", ""].join("\n"),
      );
      await fs.mkdir(path.join(dir, "meta"));
      await fs.writeFile(
        path.join(dir, "meta", "TestMetadata.json"),
        JSON.stringify({ ExperimentalFeatures: { PSNativeCommandErrorActionPreference: [] } }),
      );
      const lines: string[] = [];
      await PlanCommand.run(["--json", "--privilege-mode", "unelevated"], {
        cwd: dir,
        env: {},
        collaborators: collaborators(),
        write: (line) => lines.push(line),
      });
      const output = JSON.parse(lines.join("\n"));
      assert.equal(output.platform, "linux");
      assert.equal(output.hostPath, "/build/out/Release/pwsh");
      assert.deepEqual(output.invocations, [
        {
          label: "UnelevatedTests",
          privilege: "unelevated",
          include: ["CI"],
          exclude: ["Feature", "Scenario", "Slow", "RequireSudoOnUnix"],
          scope: "corpus",
          experimentalFeature: null,
          allowEmptyResult: false,
        },
        {
          label: "PSNativeCommandErrorActionPreference-UnelevatedTests",
          privilege: "unelevated",
          include: ["CI"],
          exclude: ["Feature", "Scenario", "Slow", "RequireSudoOnUnix"],
          scope: "corpus",
          experimentalFeature: "PSNativeCommandErrorActionPreference",
          allowEmptyResult: true,
        },
      ]);
    });
  });

  it("prints a summary line and the host path", async () => {
    await withWorkspace(async (dir) => {
      const lines: string[] = [];
      await PlanCommand.run(["--platform", "macos"], {
        cwd: dir,
        env: { BUILD_REASON: "Schedule" },
        collaborators: collaborators(),
        write: (line) => lines.push(line),
      });
      assert.equal(lines[0], "Daily build (ScheduledTrigger) on macos");
      assert.equal(lines[1], "Test host: /build/out/Release/pwsh");
      assert.equal(lines[2].split("\n")[0], "LABEL           | PRIVILEGE  | INCLUDE             | EXCLUDE           | SCOPE");
    });
  });

  it("fails before planning when the host is missing", async () => {
    await withWorkspace(async (dir) => {
      await assert.rejects(
        PlanCommand.run([], { cwd: dir, env: {}, collaborators: collaborators(new FakeArtifactLocator(null)) }),
        (error: unknown) => isCiPolicyError(error, "missing_artifact"),
      );
    });
  });
});
