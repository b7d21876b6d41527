import type { Platform, TestInvocationSpec, TestRunResult } from "@ciplan/shared";

export interface TestEngineContext {
  hostPath: string;
  platform: Platform;
  workspaceRoot: string;
  /** Test root used when a spec covers the whole corpus. */
  testRoot: string;
  resultsDir: string;
  env: NodeJS.ProcessEnv;
}

export interface TestEngine {
  invoke(spec: TestInvocationSpec, ctx: TestEngineContext): Promise<TestRunResult>;
}
