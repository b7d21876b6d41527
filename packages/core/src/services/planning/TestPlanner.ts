import {
  createTagSet,
  onlyIncluding,
  withExcluded,
  type BuildClassification,
  type ExperimentalFeatureMap,
  type Platform,
  type Privilege,
  type PrivilegeMode,
  type TestInvocationSpec,
  type TestTag,
  type TestTagSet,
} from "@ciplan/shared";
import type { BuildArtifactLocator } from "@ciplan/integrations";
import { createMissingArtifactError } from "../../errors/CiPolicyErrors.js";

export interface PlanInput {
  classification: BuildClassification;
  platform: Platform;
  privilegeMode: PrivilegeMode;
  experimentalFeatures?: ExperimentalFeatureMap;
}

export interface TestPlan {
  hostPath: string;
  invocations: TestInvocationSpec[];
}

export interface TestPlannerOptions {
  artifactLocator: BuildArtifactLocator;
  configuration: string;
}

const PARTITION_LABELS: Record<Privilege, string> = {
  unelevated: "UnelevatedTests",
  elevated: "ElevatedTests",
};

export const baselineTagSet = (classification: BuildClassification): TestTagSet =>
  classification.isDaily
    ? createTagSet(["CI", "Feature", "Scenario"])
    : createTagSet(["CI"], ["Slow", "Feature", "Scenario"]);

export const privilegeTag = (platform: Platform): TestTag =>
  platform === "windows" ? "RequireAdminOnWindows" : "RequireSudoOnUnix";

export const partitionsFor = (mode: PrivilegeMode): Privilege[] =>
  mode === "all" ? ["unelevated", "elevated"] : [mode];

export const partitionTagSet = (base: TestTagSet, privilege: Privilege, platform: Platform): TestTagSet => {
  const tag = privilegeTag(platform);
  return privilege === "unelevated" ? withExcluded(base, tag) : onlyIncluding(base, tag);
};

/**
 * Pure planning: for each privilege partition the baseline spec comes first,
 * followed by one spec per experimental feature in map order. Every spec is
 * built independently from the partition's tag set.
 */
export const planTestInvocations = (input: PlanInput): TestInvocationSpec[] => {
  const base = baselineTagSet(input.classification);
  const features = input.experimentalFeatures ?? new Map<string, readonly string[]>();
  const invocations: TestInvocationSpec[] = [];
  for (const privilege of partitionsFor(input.privilegeMode)) {
    const tagSet = partitionTagSet(base, privilege, input.platform);
    const label = PARTITION_LABELS[privilege];
    invocations.push({
      tagSet,
      outputLabel: label,
      privilege,
      scope: { kind: "corpus" },
      allowEmptyResult: false,
    });
    for (const [feature, files] of features) {
      invocations.push({
        tagSet,
        outputLabel: `${feature}-${label}`,
        privilege,
        scope: files.length ? { kind: "files", files: [...files] } : { kind: "corpus" },
        experimentalFeature: feature,
        allowEmptyResult: true,
      });
    }
  }
  return invocations;
};

export class TestPlanner {
  constructor(private readonly options: TestPlannerOptions) {}

  /** Rejects with `missing_artifact` before planning when the test host is not built. */
  async plan(input: PlanInput): Promise<TestPlan> {
    const { artifactLocator, configuration } = this.options;
    const hostPath = await artifactLocator.locate(configuration);
    if (!hostPath) {
      throw createMissingArtifactError({ configuration, expectedPath: artifactLocator.describeLocation?.(configuration) });
    }
    return { hostPath, invocations: planTestInvocations(input) };
  }
}
