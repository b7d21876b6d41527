import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { tagSetToJson, type TestInvocationSpec } from "@ciplan/shared";
import { FakeArtifactLocator } from "@ciplan/testing";
import { isCiPolicyError } from "../../../errors/CiPolicyErrors.js";
import { TestPlanner, baselineTagSet, planTestInvocations } from "../TestPlanner.js";

const standard = { isDaily: false, reason: "None" } as const;
const daily = { isDaily: true, reason: "ScheduledTrigger" } as const;

const summarize = (spec: TestInvocationSpec) => ({
  label: spec.outputLabel,
  privilege: spec.privilege,
  ...tagSetToJson(spec.tagSet),
  scope: spec.scope,
  feature: spec.experimentalFeature,
  allowEmptyResult: spec.allowEmptyResult,
});

describe("baselineTagSet", () => {
  it("restricts a standard build to CI tests", () => {
    assert.deepEqual(tagSetToJson(baselineTagSet(standard)), {
      include: ["CI"],
      exclude: ["Feature", "Scenario", "Slow"],
    });
  });

  it("opens a daily build to feature and scenario tests", () => {
    assert.deepEqual(tagSetToJson(baselineTagSet(daily)), { include: ["CI", "Feature", "Scenario"], exclude: [] });
  });
});

describe("planTestInvocations", () => {
  it("plans an unelevated and an elevated partition on Windows", () => {
    const specs = planTestInvocations({ classification: standard, platform: "windows", privilegeMode: "all" });
    assert.deepEqual(specs.map(summarize), [
      {
        label: "UnelevatedTests",
        privilege: "unelevated",
        include: ["CI"],
        exclude: ["Feature", "Scenario", "Slow", "RequireAdminOnWindows"],
        scope: { kind: "corpus" },
        feature: undefined,
        allowEmptyResult: false,
      },
      {
        label: "ElevatedTests",
        privilege: "elevated",
        include: ["RequireAdminOnWindows"],
        exclude: ["Feature", "Scenario", "Slow"],
        scope: { kind: "corpus" },
        feature: undefined,
        allowEmptyResult: false,
      },
    ]);
  });

  it("uses the sudo tag on Unix and honours a single privilege mode", () => {
    const specs = planTestInvocations({ classification: daily, platform: "linux", privilegeMode: "elevated" });
    assert.deepEqual(specs.map(summarize), [
      {
        label: "ElevatedTests",
        privilege: "elevated",
        include: ["RequireSudoOnUnix"],
        exclude: [],
        scope: { kind: "corpus" },
        feature: undefined,
        allowEmptyResult: false,
      },
    ]);
  });

  it("runs an experimental feature with no file list over the whole corpus", () => {
    const specs = planTestInvocations({
      classification: standard,
      platform: "macos",
      privilegeMode: "unelevated",
      experimentalFeatures: new Map([["PSNativeCommandErrorActionPreference", []]]),
    });
    assert.equal(specs.length, 2);
    assert.deepEqual(summarize(specs[1]), {
      label: "PSNativeCommandErrorActionPreference-UnelevatedTests",
      privilege: "unelevated",
      include: ["CI"],
      exclude: ["Feature", "Scenario", "Slow", "RequireSudoOnUnix"],
      scope: { kind: "corpus" },
      feature: "PSNativeCommandErrorActionPreference",
      allowEmptyResult: true,
    });
  });

  it("scopes an experimental feature to exactly its listed files", () => {
    const specs = planTestInvocations({
      classification: standard,
      platform: "linux",
      privilegeMode: "unelevated",
      experimentalFeatures: new Map([["FeatureA", ["a.tests.ps1"]]]),
    });
    assert.deepEqual(specs[1].scope, { kind: "files", files: ["a.tests.ps1"] });
  });

  it("orders baseline before features within each partition", () => {
    const specs = planTestInvocations({
      classification: daily,
      platform: "windows",
      privilegeMode: "all",
      experimentalFeatures: new Map<string, readonly string[]>([
        ["FeatureA", []],
        ["FeatureB", ["b.tests.ps1", "c.tests.ps1"]],
      ]),
    });
    assert.deepEqual(
      specs.map((spec) => spec.outputLabel),
      [
        "UnelevatedTests",
        "FeatureA-UnelevatedTests",
        "FeatureB-UnelevatedTests",
        "ElevatedTests",
        "FeatureA-ElevatedTests",
        "FeatureB-ElevatedTests",
      ],
    );
    assert.deepEqual(tagSetToJson(specs[5].tagSet), tagSetToJson(specs[3].tagSet));
  });

  it("never puts a tag on both sides or the privilege tag in the unelevated include set", () => {
    for (const classification of [standard, daily]) {
      for (const platform of ["windows", "linux", "macos"] as const) {
        const specs = planTestInvocations({
          classification,
          platform,
          privilegeMode: "all",
          experimentalFeatures: new Map([["F", []]]),
        });
        for (const spec of specs) {
          for (const tag of spec.tagSet.include) {
            assert.equal(spec.tagSet.exclude.has(tag), false, `${spec.outputLabel}: ${tag}`);
          }
          if (spec.privilege === "unelevated") {
            assert.equal(spec.tagSet.include.has("RequireAdminOnWindows"), false);
            assert.equal(spec.tagSet.include.has("RequireSudoOnUnix"), false);
          }
        }
      }
    }
  });
});

describe("TestPlanner.plan", () => {
  it("returns the host path with the plan", async () => {
    const locator = new FakeArtifactLocator("/out/Release/pwsh");
    const planner = new TestPlanner({ artifactLocator: locator, configuration: "Release" });
    const plan = await planner.plan({ classification: standard, platform: "linux", privilegeMode: "all" });
    assert.equal(plan.hostPath, "/out/Release/pwsh");
    assert.equal(plan.invocations.length, 2);
    assert.deepEqual(locator.requests, ["Release"]);
  });

  it("fails with missing_artifact when the host is not built", async () => {
    const planner = new TestPlanner({ artifactLocator: new FakeArtifactLocator(null), configuration: "Debug" });
    await assert.rejects(
      planner.plan({ classification: standard, platform: "linux", privilegeMode: "all" }),
      (error: unknown) => {
        assert.ok(isCiPolicyError(error, "missing_artifact"));
        assert.equal(error.message, "CI build failed: test host not found for configuration Debug");
        return true;
      },
    );
  });
});
