export * from "./config/CiConfig.js";
export * from "./config/ConfigLoader.js";
export * from "./errors/CiPolicyErrors.js";
export * from "./runtime/RunLogger.js";
export * from "./services/classification/EnvironmentSignals.js";
export * from "./services/classification/BuildClassifier.js";
export * from "./services/planning/ExperimentalFeatures.js";
export * from "./services/planning/TestPlanner.js";
export * from "./services/results/RunResultAggregator.js";
export * from "./services/packaging/PackagePlanner.js";
export * from "./services/pipeline/CiPipelineService.js";
export * from "./services/pipeline/CiServices.js";
