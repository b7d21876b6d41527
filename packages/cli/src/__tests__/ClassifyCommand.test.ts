import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { FakeVcsClient, InMemoryVariableStore, MemoryRunLog } from "@ciplan/testing";
import { ClassifyCommand, parseClassifyArgs } from "../commands/classify/ClassifyCommand.js";

const withWorkspace = async (fn: (dir: string) => Promise<void>): Promise<void> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "ciplan-classify-"));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
};

describe("classify argument parsing", () => {
  it("parses signal overrides and common flags", () => {
    const parsed = parseClassifyArgs(["--schedule", "--force-feature", "--commit=abc123", "--json", "--workspace-root", "/tmp/w"]);
    assert.equal(parsed.schedule, true);
    assert.equal(parsed.forceFeature, true);
    assert.equal(parsed.commit, "abc123");
    assert.equal(parsed.json, true);
    assert.equal(parsed.workspaceRoot?.endsWith("/tmp/w"), true);
  });

  it("rejects unknown options and missing values", () => {
    assert.throws(() => parseClassifyArgs(["--bogus"]), /Unknown option for ciplan classify: --bogus/);
    assert.throws(() => parseClassifyArgs(["--commit"]), /Missing value for --commit/);
    assert.throws(() => parseClassifyArgs(["--platform", "solaris"]), /Invalid --platform solaris/);
  });
});

describe("ClassifyCommand", () => {
  it("classifies a tagged commit as daily and persists the flag", async () => {
    await withWorkspace(async (dir) => {
      const variables = new InMemoryVariableStore();
      const vcs = new FakeVcsClient().withMessage("abc123", "Turn on the new parser [Feature]");
      const lines: string[] = [];
      await ClassifyCommand.run(["--commit", "abc123"], {
        cwd: dir,
        env: {},
        collaborators: { vcs, variables, log: new MemoryRunLog() },
        write: (line) => lines.push(line),
      });
      assert.deepEqual(lines, ["Daily build (CommitTag)"]);
      assert.deepEqual(variables.writes, [["CIPLAN_DAILY_BUILD", "true"]]);
      assert.deepEqual(vcs.lookups, [{ cwd: dir, commitId: "abc123" }]);
    });
  });

  it("reads the commit from the pipeline environment", async () => {
    await withWorkspace(async (dir) => {
      const vcs = new FakeVcsClient().withMessage("def456", "Fix typo");
      const lines: string[] = [];
      await ClassifyCommand.run(["--json"], {
        cwd: dir,
        env: { GITHUB_SHA: "def456" },
        collaborators: { vcs, variables: new InMemoryVariableStore(), log: new MemoryRunLog() },
        write: (line) => lines.push(line),
      });
      assert.deepEqual(JSON.parse(lines.join("\n")), { isDaily: false, reason: "None" });
      assert.equal(vcs.lookups.length, 1);
    });
  });

  it("honours the force-feature flag", async () => {
    await withWorkspace(async (dir) => {
      const variables = new InMemoryVariableStore();
      const lines: string[] = [];
      await ClassifyCommand.run(["--force-feature"], {
        cwd: dir,
        env: {},
        collaborators: { vcs: new FakeVcsClient(), variables, log: new MemoryRunLog() },
        write: (line) => lines.push(line),
      });
      assert.deepEqual(lines, ["Daily build (ManualOverride)"]);
      assert.equal(variables.get("CIPLAN_DAILY_BUILD"), "true");
    });
  });
});
