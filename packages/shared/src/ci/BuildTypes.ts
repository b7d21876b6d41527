export type Platform = "windows" | "linux" | "macos";

export const PLATFORMS: readonly Platform[] = ["windows", "linux", "macos"];

export type ClassificationReason = "ScheduledTrigger" | "CommitTag" | "ManualOverride" | "None";

export interface BuildClassification {
  readonly isDaily: boolean;
  readonly reason: ClassificationReason;
}

/**
 * Signals a pipeline exposes about why it is running. Read once from the
 * environment by the caller; the classifier never looks at process.env.
 */
export interface EnvironmentSignals {
  scheduled: boolean;
  forceFeature: boolean;
  commitId?: string;
}

export type PrivilegeMode = "all" | "unelevated" | "elevated";

export type Privilege = "unelevated" | "elevated";

export const PRIVILEGE_MODES: readonly PrivilegeMode[] = ["all", "unelevated", "elevated"];

export const isPlatform = (value: unknown): value is Platform =>
  typeof value === "string" && (PLATFORMS as readonly string[]).includes(value);

export const isPrivilegeMode = (value: unknown): value is PrivilegeMode =>
  typeof value === "string" && (PRIVILEGE_MODES as readonly string[]).includes(value);

export const platformFromNode = (nodePlatform: NodeJS.Platform = process.platform): Platform => {
  if (nodePlatform === "win32") return "windows";
  if (nodePlatform === "darwin") return "macos";
  return "linux";
};
