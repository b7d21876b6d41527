import type { TestRunResult, Verdict } from "@ciplan/shared";
import type { PipelineVariableStore } from "@ciplan/integrations";
import { GuardedRunLog, NoopRunLog, type RunLog } from "../../runtime/RunLogger.js";

export interface RunResultAggregatorOptions {
  variables: PipelineVariableStore;
  /** Completion flag read by the publish stage; only ever set to "true". */
  testsPassedVariable: string;
  log?: RunLog;
}

const plural = (count: number, noun: string): string => `${count} ${noun}${count === 1 ? "" : "s"}`;

/** Returns the violation for one result, or undefined when it satisfies its rule. */
export const violationFor = (result: TestRunResult): string | undefined => {
  if (result.error !== undefined) return `${result.label}: ${result.error}`;
  if (result.failed > 0) return `${result.label}: ${plural(result.failed, "test")} failed`;
  if (!result.allowEmptyResult && result.passed <= 0) {
    return `${result.label}: no tests passed (an empty run is not allowed for this partition)`;
  }
  return undefined;
};

/**
 * Every result is checked; the verdict lists all violations and surfaces the
 * first one as the failure reason.
 */
export const evaluateResults = (results: readonly TestRunResult[]): Verdict => {
  const reasons: string[] = [];
  for (const result of results) {
    const violation = violationFor(result);
    if (violation) reasons.push(violation);
  }
  return reasons.length ? { status: "fail", failureReason: reasons[0], reasons } : { status: "pass", reasons };
};

export class RunResultAggregator {
  private readonly log: RunLog;

  constructor(private readonly options: RunResultAggregatorOptions) {
    this.log = new GuardedRunLog(options.log ?? new NoopRunLog());
  }

  async aggregate(results: readonly TestRunResult[]): Promise<Verdict> {
    const verdict = evaluateResults(results);
    await this.log.log("verdict", {
      status: verdict.status,
      results: results.length,
      reasons: verdict.reasons,
    });
    if (verdict.status === "pass") {
      await this.options.variables.set(this.options.testsPassedVariable, "true");
    }
    return verdict;
  }
}
