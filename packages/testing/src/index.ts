export * from "./fakes/vcs/FakeVcsClient.js";
export * from "./fakes/pipeline/InMemoryVariableStore.js";
export * from "./fakes/artifacts/FakeArtifactLocator.js";
export * from "./fakes/testengine/FakeTestEngine.js";
export * from "./fakes/runtime/MemoryRunLog.js";
