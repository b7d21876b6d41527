import type {
  BuildClassification,
  EnvironmentSignals,
  ExperimentalFeatureMap,
  Platform,
  PrivilegeMode,
  TestInvocationSpec,
  TestRunResult,
  Verdict,
} from "@ciplan/shared";
import { tagSetToJson } from "@ciplan/shared";
import type { TestEngine, TestEngineContext } from "@ciplan/integrations";
import { createAggregationFailedError, createTestPartitionFailedError } from "../../errors/CiPolicyErrors.js";
import { GuardedRunLog, NoopRunLog, type RunLog } from "../../runtime/RunLogger.js";
import type { BuildClassifier } from "../classification/BuildClassifier.js";
import type { TestPlan, TestPlanner } from "../planning/TestPlanner.js";
import type { RunResultAggregator } from "../results/RunResultAggregator.js";

export interface CiPipelineDependencies {
  classifier: BuildClassifier;
  planner: TestPlanner;
  engine: TestEngine;
  aggregator: RunResultAggregator;
  log?: RunLog;
}

export interface CiPipelineRunInput {
  signals: EnvironmentSignals;
  platform: Platform;
  privilegeMode: PrivilegeMode;
  experimentalFeatures?: ExperimentalFeatureMap;
  engineContext: Omit<TestEngineContext, "hostPath" | "platform">;
  onResult?: (result: TestRunResult) => void;
}

export interface CiPipelineOutcome {
  classification: BuildClassification;
  plan: TestPlan;
  results: TestRunResult[];
  verdict: Verdict;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const describeInvocation = (spec: TestInvocationSpec): Record<string, unknown> => ({
  label: spec.outputLabel,
  privilege: spec.privilege,
  ...tagSetToJson(spec.tagSet),
  scope: spec.scope.kind === "files" ? [...spec.scope.files] : "corpus",
  experimentalFeature: spec.experimentalFeature ?? null,
  allowEmptyResult: spec.allowEmptyResult,
});

/**
 * classify → plan → run every invocation in order → aggregate.
 * Invocations never overlap; a failing one is recorded and the rest still run.
 */
export class CiPipelineService {
  private readonly log: RunLog;

  constructor(private readonly deps: CiPipelineDependencies) {
    this.log = new GuardedRunLog(deps.log ?? new NoopRunLog());
  }

  /** Resolves with the outcome on a pass; rejects with `aggregation_failed` otherwise. */
  async run(input: CiPipelineRunInput): Promise<CiPipelineOutcome> {
    const outcome = await this.execute(input);
    if (outcome.verdict.status === "fail") {
      throw createAggregationFailedError(outcome.verdict.reasons);
    }
    return outcome;
  }

  /** Same sequence as `run`, but a failing verdict is returned instead of thrown. */
  async execute(input: CiPipelineRunInput): Promise<CiPipelineOutcome> {
    const classification = await this.deps.classifier.classify(input.signals);
    const plan = await this.deps.planner.plan({
      classification,
      platform: input.platform,
      privilegeMode: input.privilegeMode,
      experimentalFeatures: input.experimentalFeatures,
    });
    await this.log.log("plan", {
      hostPath: plan.hostPath,
      isDaily: classification.isDaily,
      invocations: plan.invocations.map(describeInvocation),
    });

    const context: TestEngineContext = { ...input.engineContext, hostPath: plan.hostPath, platform: input.platform };
    const results: TestRunResult[] = [];
    for (const spec of plan.invocations) {
      const result = await this.invoke(spec, context);
      results.push(result);
      input.onResult?.(result);
    }

    const verdict = await this.deps.aggregator.aggregate(results);
    return { classification, plan, results, verdict };
  }

  private async invoke(spec: TestInvocationSpec, context: TestEngineContext): Promise<TestRunResult> {
    await this.log.log("invocation_started", describeInvocation(spec));
    let result: TestRunResult;
    try {
      result = await this.deps.engine.invoke(spec, context);
    } catch (error) {
      result = {
        label: spec.outputLabel,
        passed: 0,
        failed: 0,
        allowEmptyResult: spec.allowEmptyResult,
        error: errorMessage(error),
      };
    }
    if (result.error !== undefined) {
      const failure = createTestPartitionFailedError(spec.outputLabel, result.error);
      await this.log.log("partition_failed", { code: failure.code, label: spec.outputLabel, message: failure.message });
    }
    await this.log.log("invocation_finished", {
      label: result.label,
      passed: result.passed,
      failed: result.failed,
      error: result.error ?? null,
    });
    return result;
  }
}
