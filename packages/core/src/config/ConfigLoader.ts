import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { isPlatform, isPrivilegeMode, platformFromNode, type Platform, type PrivilegeMode } from "@ciplan/shared";
import { isVariableStoreSelection, type VariableStoreSelection } from "@ciplan/integrations";
import {
  DEFAULT_ARTIFACT,
  DEFAULT_FEATURE_TAG_PATTERN,
  DEFAULT_LOGGING,
  DEFAULT_RESULTS,
  DEFAULT_TESTS,
  DEFAULT_VARIABLES,
  type ArtifactConfig,
  type CiplanConfig,
  type LoggingConfig,
  type ReleaseConfig,
  type ResultsConfig,
  type TestsConfig,
  type VariablesConfig,
} from "./CiConfig.js";

export interface ConfigSource {
  workspaceRoot?: string;
  platform?: Platform;
  privilegeMode?: PrivilegeMode;
  configuration?: string;
  featureTagPattern?: string;
  experimentalFeatures?: Record<string, string[]>;
  variableStore?: VariableStoreSelection;
  artifact?: Partial<ArtifactConfig>;
  results?: Partial<ResultsConfig>;
  tests?: Partial<TestsConfig>;
  variables?: Partial<VariablesConfig>;
  release?: Partial<ReleaseConfig>;
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  configPath?: string;
}

export const CONFIG_FILE_NAMES = ["ciplan.config.yaml", "ciplan.config.yml", "ciplan.config.json"];

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_.]*$/;

export const parseBoolean = (value: string | undefined): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
};

const nonEmpty = (value: string | undefined): string | undefined => {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

const stringField = (value: unknown, label: string, errors: string[]): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number") return String(value);
  if (typeof value !== "string") {
    errors.push(`${label} (expected string)`);
    return undefined;
  }
  return value;
};

const booleanField = (value: unknown, label: string, errors: string[]): boolean | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    errors.push(`${label} (expected boolean)`);
    return undefined;
  }
  return value;
};

const sectionField = (value: unknown, label: string, errors: string[]): Record<string, unknown> | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    errors.push(`${label} (expected object)`);
    return undefined;
  }
  return value;
};

export const normalizeFeatureMap = (
  value: unknown,
  label: string,
  errors: string[],
): Record<string, string[]> | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    errors.push(`${label} (expected object)`);
    return undefined;
  }
  const features: Record<string, string[]> = {};
  for (const [name, files] of Object.entries(value)) {
    if (!name.trim()) {
      errors.push(`${label} (empty feature name)`);
      continue;
    }
    if (!Array.isArray(files) || !files.every((file): file is string => typeof file === "string")) {
      errors.push(`${label}.${name} (expected list of test files)`);
      continue;
    }
    features[name] = files.map((file) => file.trim()).filter(Boolean);
  }
  return features;
};

/** Validates a parsed config file into a ConfigSource, collecting every bad key. */
export const normalizeConfigSource = (raw: unknown, label = "config"): ConfigSource => {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new Error(`Invalid ${label}: expected a mapping at the top level.`);
  }
  const errors: string[] = [];
  const source: ConfigSource = {};

  const workspaceRoot = stringField(raw.workspaceRoot, `${label}.workspaceRoot`, errors);
  if (workspaceRoot !== undefined) source.workspaceRoot = workspaceRoot;
  if (raw.platform !== undefined) {
    if (isPlatform(raw.platform)) source.platform = raw.platform;
    else errors.push(`${label}.platform (expected windows|linux|macos)`);
  }
  if (raw.privilegeMode !== undefined) {
    if (isPrivilegeMode(raw.privilegeMode)) source.privilegeMode = raw.privilegeMode;
    else errors.push(`${label}.privilegeMode (expected all|unelevated|elevated)`);
  }
  if (raw.variableStore !== undefined) {
    if (isVariableStoreSelection(raw.variableStore)) source.variableStore = raw.variableStore;
    else errors.push(`${label}.variableStore (expected auto|azure|github|process)`);
  }
  const configuration = stringField(raw.configuration, `${label}.configuration`, errors);
  if (configuration !== undefined) source.configuration = configuration;
  const featureTagPattern = stringField(raw.featureTagPattern, `${label}.featureTagPattern`, errors);
  if (featureTagPattern !== undefined) source.featureTagPattern = featureTagPattern;
  const experimentalFeatures = normalizeFeatureMap(raw.experimentalFeatures, `${label}.experimentalFeatures`, errors);
  if (experimentalFeatures) source.experimentalFeatures = experimentalFeatures;

  const artifact = sectionField(raw.artifact, `${label}.artifact`, errors);
  if (artifact) {
    source.artifact = {
      dir: stringField(artifact.dir, `${label}.artifact.dir`, errors),
      path: stringField(artifact.path, `${label}.artifact.path`, errors),
      executable: stringField(artifact.executable, `${label}.artifact.executable`, errors),
    };
  }
  const results = sectionField(raw.results, `${label}.results`, errors);
  if (results) {
    source.results = { dir: stringField(results.dir, `${label}.results.dir`, errors) };
  }
  const tests = sectionField(raw.tests, `${label}.tests`, errors);
  if (tests) {
    source.tests = {
      root: stringField(tests.root, `${label}.tests.root`, errors),
      metadataPath: stringField(tests.metadataPath, `${label}.tests.metadataPath`, errors),
    };
  }
  const variables = sectionField(raw.variables, `${label}.variables`, errors);
  if (variables) {
    source.variables = {
      dailyBuild: stringField(variables.dailyBuild, `${label}.variables.dailyBuild`, errors),
      testsPassed: stringField(variables.testsPassed, `${label}.variables.testsPassed`, errors),
    };
  }
  const release = sectionField(raw.release, `${label}.release`, errors);
  if (release) {
    source.release = {
      nextReleaseTag: stringField(release.nextReleaseTag, `${label}.release.nextReleaseTag`, errors),
      buildId: stringField(release.buildId, `${label}.release.buildId`, errors),
    };
  }
  const logging = sectionField(raw.logging, `${label}.logging`, errors);
  if (logging) {
    source.logging = {
      enabled: booleanField(logging.enabled, `${label}.logging.enabled`, errors),
      dir: stringField(logging.dir, `${label}.logging.dir`, errors),
    };
  }

  if (errors.length) {
    throw new Error(`Invalid config values: ${errors.join(", ")}`);
  }
  return source;
};

const findConfigFile = (cwd: string): string | undefined => {
  for (const candidate of CONFIG_FILE_NAMES) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const readConfigFile = async (configPath?: string): Promise<ConfigSource | undefined> => {
  if (!configPath) return undefined;
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  return normalizeConfigSource(YAML.parse(content), path.basename(configPath));
};

const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const errors: string[] = [];
  const source: ConfigSource = {};
  const workspaceRoot = nonEmpty(env.CIPLAN_WORKSPACE_ROOT);
  if (workspaceRoot) source.workspaceRoot = workspaceRoot;
  const platform = nonEmpty(env.CIPLAN_PLATFORM);
  if (platform) {
    if (isPlatform(platform)) source.platform = platform;
    else errors.push("CIPLAN_PLATFORM");
  }
  const privilegeMode = nonEmpty(env.CIPLAN_PRIVILEGE_MODE);
  if (privilegeMode) {
    if (isPrivilegeMode(privilegeMode)) source.privilegeMode = privilegeMode;
    else errors.push("CIPLAN_PRIVILEGE_MODE");
  }
  const variableStore = nonEmpty(env.CIPLAN_VARIABLE_STORE);
  if (variableStore) {
    if (isVariableStoreSelection(variableStore)) source.variableStore = variableStore;
    else errors.push("CIPLAN_VARIABLE_STORE");
  }
  const configuration = nonEmpty(env.CIPLAN_CONFIGURATION);
  if (configuration) source.configuration = configuration;
  const featureTagPattern = nonEmpty(env.CIPLAN_FEATURE_TAG_PATTERN);
  if (featureTagPattern) source.featureTagPattern = featureTagPattern;

  source.artifact = { dir: nonEmpty(env.CIPLAN_ARTIFACT_DIR), path: nonEmpty(env.CIPLAN_ARTIFACT_PATH) };
  source.results = { dir: nonEmpty(env.CIPLAN_RESULTS_DIR) };
  source.tests = { metadataPath: nonEmpty(env.CIPLAN_TEST_METADATA) };
  source.release = {
    nextReleaseTag: nonEmpty(env.CIPLAN_NEXT_RELEASE_TAG),
    buildId: nonEmpty(env.CIPLAN_BUILD_ID) ?? nonEmpty(env.BUILD_BUILDID) ?? nonEmpty(env.GITHUB_RUN_NUMBER),
  };
  const loggingEnabled = parseBoolean(env.CIPLAN_LOGGING);
  if (env.CIPLAN_LOGGING && loggingEnabled === undefined) errors.push("CIPLAN_LOGGING");
  source.logging = { enabled: loggingEnabled, dir: nonEmpty(env.CIPLAN_LOG_DIR) };

  if (errors.length) {
    throw new Error(`Invalid environment values: ${errors.join(", ")}`);
  }
  return source;
};

const mergeConfigs = (defaults: CiplanConfig, ...sources: Array<ConfigSource | undefined>): CiplanConfig => {
  let merged = defaults;
  for (const source of sources) {
    if (!source) continue;
    merged = {
      workspaceRoot: source.workspaceRoot ?? merged.workspaceRoot,
      platform: source.platform ?? merged.platform,
      privilegeMode: source.privilegeMode ?? merged.privilegeMode,
      configuration: source.configuration ?? merged.configuration,
      featureTagPattern: source.featureTagPattern ?? merged.featureTagPattern,
      experimentalFeatures: source.experimentalFeatures ?? merged.experimentalFeatures,
      variableStore: source.variableStore ?? merged.variableStore,
      artifact: {
        dir: source.artifact?.dir ?? merged.artifact.dir,
        path: source.artifact?.path ?? merged.artifact.path,
        executable: source.artifact?.executable ?? merged.artifact.executable,
      },
      results: { dir: source.results?.dir ?? merged.results.dir },
      tests: {
        root: source.tests?.root ?? merged.tests.root,
        metadataPath: source.tests?.metadataPath ?? merged.tests.metadataPath,
      },
      variables: {
        dailyBuild: source.variables?.dailyBuild ?? merged.variables.dailyBuild,
        testsPassed: source.variables?.testsPassed ?? merged.variables.testsPassed,
      },
      release: {
        nextReleaseTag: source.release?.nextReleaseTag ?? merged.release.nextReleaseTag,
        buildId: source.release?.buildId ?? merged.release.buildId,
      },
      logging: {
        enabled: source.logging?.enabled ?? merged.logging.enabled,
        dir: source.logging?.dir ?? merged.logging.dir,
      },
    };
  }
  return merged;
};

const finalizeConfig = (cwd: string, config: CiplanConfig): CiplanConfig => ({
  ...config,
  workspaceRoot: path.resolve(cwd, config.workspaceRoot),
});

const assertValid = (config: CiplanConfig): void => {
  const errors: string[] = [];
  try {
    new RegExp(config.featureTagPattern, "i");
  } catch {
    errors.push("featureTagPattern");
  }
  if (!config.configuration.trim()) errors.push("configuration");
  if (!VARIABLE_NAME.test(config.variables.dailyBuild)) errors.push("variables.dailyBuild");
  if (!VARIABLE_NAME.test(config.variables.testsPassed)) errors.push("variables.testsPassed");
  if (config.variables.dailyBuild === config.variables.testsPassed) errors.push("variables (names must differ)");
  if (config.release.nextReleaseTag !== undefined && !/^v\d/.test(config.release.nextReleaseTag)) {
    errors.push("release.nextReleaseTag");
  }
  if (config.release.buildId !== undefined && !/^[A-Za-z0-9_.-]+$/.test(config.release.buildId)) {
    errors.push("release.buildId");
  }
  if (errors.length) {
    throw new Error(`Invalid config values: ${errors.join(", ")}`);
  }
};

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<CiplanConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath ? path.resolve(cwd, options.configPath) : findConfigFile(cwd);
  const fileConfig = await readConfigFile(configPath);
  const envConfig = loadEnvConfig(env);

  const defaults: CiplanConfig = {
    workspaceRoot: ".",
    platform: platformFromNode(),
    privilegeMode: "all",
    configuration: "Release",
    featureTagPattern: DEFAULT_FEATURE_TAG_PATTERN,
    experimentalFeatures: undefined,
    variableStore: "auto",
    artifact: DEFAULT_ARTIFACT,
    results: DEFAULT_RESULTS,
    tests: DEFAULT_TESTS,
    variables: DEFAULT_VARIABLES,
    release: {},
    logging: DEFAULT_LOGGING,
  };

  const merged = mergeConfigs(defaults, fileConfig, envConfig, options.cli);
  const finalized = finalizeConfig(cwd, merged);
  assertValid(finalized);
  return finalized;
};
