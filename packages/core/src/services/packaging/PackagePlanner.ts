import {
  PACKAGE_TYPE_ORDER,
  type BuildClassification,
  type PackagePlan,
  type PackageType,
  type Platform,
  type PublishDecision,
  type Verdict,
} from "@ciplan/shared";

/** Packaging only depends on whether the build is daily, not on why. */
export type PackageBuildKind = Pick<BuildClassification, "isDaily">;

export interface PackagePlanInput {
  classification: PackageBuildKind;
  platform: Platform;
  nextReleaseTag: string;
  buildId?: string;
}

interface PackageMatrix {
  types: PackageType[];
  runtimes: string[];
  dailyTypes: PackageType[];
  dailyRuntimes: string[];
}

const PACKAGE_MATRIX: Record<Platform, PackageMatrix> = {
  windows: {
    types: ["msi", "zip"],
    runtimes: ["win7-x64", "win7-x86"],
    dailyTypes: ["nupkg"],
    dailyRuntimes: ["win-arm", "win-arm64"],
  },
  linux: {
    types: ["tar"],
    runtimes: ["linux-x64"],
    dailyTypes: ["tar-arm"],
    dailyRuntimes: ["linux-arm", "linux-arm64"],
  },
  macos: {
    types: ["tar"],
    runtimes: ["osx-x64"],
    dailyTypes: [],
    dailyRuntimes: ["osx-arm64"],
  },
};

/**
 * `v7.5.0-preview.3` with build id `4711` becomes `v7.5.0-preview.4711`:
 * the first three dot-separated segments are kept and the build id appended.
 */
export const releaseTagFor = (nextReleaseTag: string, buildId?: string): string => {
  if (!/^v\d/.test(nextReleaseTag)) {
    throw new Error(`Release tag must look like v<major>.<minor>.<patch>: ${nextReleaseTag}`);
  }
  if (!buildId) return nextReleaseTag;
  return `${nextReleaseTag.split(".").slice(0, 3).join(".")}.${buildId}`;
};

export const planPackages = (input: PackagePlanInput): PackagePlan => {
  const matrix = PACKAGE_MATRIX[input.platform];
  const types = new Set<PackageType>(input.classification.isDaily ? [...matrix.types, ...matrix.dailyTypes] : matrix.types);
  const runtimes = input.classification.isDaily ? [...matrix.runtimes, ...matrix.dailyRuntimes] : matrix.runtimes;
  return {
    types: new Set(PACKAGE_TYPE_ORDER.filter((type) => types.has(type))),
    releaseTag: releaseTagFor(input.nextReleaseTag, input.buildId),
    platformRuntimes: new Set(runtimes),
  };
};

/** Packages are built only after a pass; the feed only takes daily builds. */
export const decidePublish = (verdict: Verdict, classification: PackageBuildKind): PublishDecision => {
  const passed = verdict.status === "pass";
  return { buildPackages: passed, publishToFeed: passed && classification.isDaily };
};

export const packagePlanToJson = (plan: PackagePlan): { types: PackageType[]; releaseTag: string; platformRuntimes: string[] } => ({
  types: [...plan.types],
  releaseTag: plan.releaseTag,
  platformRuntimes: [...plan.platformRuntimes],
});
