import {
  FileSystemArtifactLocator,
  PesterTestEngine,
  VcsClient,
  createVariableStore,
  type BuildArtifactLocator,
  type CommitLogReader,
  type PipelineVariableStore,
  type TestEngine,
} from "@ciplan/integrations";
import type { CiplanConfig } from "../../config/CiConfig.js";
import { NoopRunLog, RunLogger, createRunId, type RunLog } from "../../runtime/RunLogger.js";
import { BuildClassifier } from "../classification/BuildClassifier.js";
import { TestPlanner } from "../planning/TestPlanner.js";
import { RunResultAggregator } from "../results/RunResultAggregator.js";
import { CiPipelineService } from "./CiPipelineService.js";

/** Collaborators that tests replace with fakes. */
export interface CiCollaborators {
  vcs?: CommitLogReader;
  variables?: PipelineVariableStore;
  artifactLocator?: BuildArtifactLocator;
  engine?: TestEngine;
  log?: RunLog;
}

export interface CiServices {
  classifier: BuildClassifier;
  planner: TestPlanner;
  aggregator: RunResultAggregator;
  pipeline: CiPipelineService;
  variables: PipelineVariableStore;
  log: RunLog;
}

export const createRunLog = (config: CiplanConfig): RunLog =>
  config.logging.enabled ? new RunLogger(config.workspaceRoot, config.logging.dir, createRunId()) : new NoopRunLog();

export const createCiServices = (
  config: CiplanConfig,
  env: NodeJS.ProcessEnv = process.env,
  collaborators: CiCollaborators = {},
): CiServices => {
  const log = collaborators.log ?? createRunLog(config);
  const variables = collaborators.variables ?? createVariableStore(config.variableStore, env);
  const classifier = new BuildClassifier({
    workspaceRoot: config.workspaceRoot,
    vcs: collaborators.vcs ?? new VcsClient(),
    variables,
    featureTagPattern: config.featureTagPattern,
    dailyBuildVariable: config.variables.dailyBuild,
    log,
  });
  const planner = new TestPlanner({
    artifactLocator:
      collaborators.artifactLocator ??
      new FileSystemArtifactLocator({
        workspaceRoot: config.workspaceRoot,
        platform: config.platform,
        artifactDir: config.artifact.dir,
        executable: config.artifact.executable,
        explicitPath: config.artifact.path,
      }),
    configuration: config.configuration,
  });
  const aggregator = new RunResultAggregator({ variables, testsPassedVariable: config.variables.testsPassed, log });
  const pipeline = new CiPipelineService({
    classifier,
    planner,
    engine: collaborators.engine ?? new PesterTestEngine(),
    aggregator,
    log,
  });
  return { classifier, planner, aggregator, pipeline, variables, log };
};
