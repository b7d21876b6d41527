import type { Platform, PrivilegeMode } from "@ciplan/shared";
import type { VariableStoreSelection } from "@ciplan/integrations";

export interface ArtifactConfig {
  /** Build output root; the host is looked up under `<dir>/<configuration>`. */
  dir: string;
  path?: string;
  executable?: string;
}

export interface ResultsConfig {
  dir: string;
}

export interface TestsConfig {
  root: string;
  metadataPath: string;
}

export interface VariablesConfig {
  dailyBuild: string;
  testsPassed: string;
}

export interface ReleaseConfig {
  nextReleaseTag?: string;
  buildId?: string;
}

export interface LoggingConfig {
  enabled: boolean;
  dir: string;
}

export interface CiplanConfig {
  workspaceRoot: string;
  platform: Platform;
  privilegeMode: PrivilegeMode;
  configuration: string;
  featureTagPattern: string;
  experimentalFeatures?: Record<string, string[]>;
  variableStore: VariableStoreSelection;
  artifact: ArtifactConfig;
  results: ResultsConfig;
  tests: TestsConfig;
  variables: VariablesConfig;
  release: ReleaseConfig;
  logging: LoggingConfig;
}

export const DEFAULT_FEATURE_TAG_PATTERN = "\\[feature\\]";

export const DEFAULT_ARTIFACT: ArtifactConfig = { dir: "out" };

export const DEFAULT_RESULTS: ResultsConfig = { dir: ".ciplan/results" };

export const DEFAULT_TESTS: TestsConfig = {
  root: "test",
  metadataPath: "test/tools/TestMetadata.json",
};

export const DEFAULT_VARIABLES: VariablesConfig = {
  dailyBuild: "CIPLAN_DAILY_BUILD",
  testsPassed: "CIPLAN_TESTS_PASSED",
};

export const DEFAULT_LOGGING: LoggingConfig = {
  enabled: true,
  dir: ".ciplan/runs",
};
