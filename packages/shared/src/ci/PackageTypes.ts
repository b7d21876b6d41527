export type PackageType = "msi" | "nupkg" | "zip" | "tar" | "tar-arm";

export const PACKAGE_TYPE_ORDER: readonly PackageType[] = ["msi", "nupkg", "zip", "tar", "tar-arm"];

export interface PackagePlan {
  types: ReadonlySet<PackageType>;
  releaseTag: string;
  platformRuntimes: ReadonlySet<string>;
}

export interface PublishDecision {
  buildPackages: boolean;
  publishToFeed: boolean;
}
