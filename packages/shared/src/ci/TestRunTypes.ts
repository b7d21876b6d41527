import type { Privilege } from "./BuildTypes.js";
import type { TestTagSet } from "./TestTags.js";

/** Feature name to test files; an empty list means the whole corpus. */
export type ExperimentalFeatureMap = ReadonlyMap<string, readonly string[]>;

export type TestScope =
  | { kind: "corpus" }
  | { kind: "files"; files: readonly string[] };

export interface TestInvocationSpec {
  readonly tagSet: TestTagSet;
  readonly outputLabel: string;
  readonly privilege: Privilege;
  readonly scope: TestScope;
  readonly experimentalFeature?: string;
  readonly allowEmptyResult: boolean;
}

export interface TestRunResult {
  label: string;
  passed: number;
  failed: number;
  allowEmptyResult: boolean;
  /** Set when the invocation produced no usable summary. */
  error?: string;
}

export type VerdictStatus = "pass" | "fail";

export interface Verdict {
  status: VerdictStatus;
  failureReason?: string;
  reasons: string[];
}
