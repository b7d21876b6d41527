export * from "./ci/BuildTypes.js";
export * from "./ci/TestTags.js";
export * from "./ci/TestRunTypes.js";
export * from "./ci/PackageTypes.js";
export * from "./paths/PathHelper.js";
