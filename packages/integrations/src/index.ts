export * from "./vcs/VcsClient.js";
export * from "./artifacts/BuildArtifactLocator.js";
export * from "./pipeline/PipelineVariableStore.js";
export * from "./testengine/TestEngineTypes.js";
export * from "./testengine/NunitResultReader.js";
export * from "./testengine/PesterTestEngine.js";
