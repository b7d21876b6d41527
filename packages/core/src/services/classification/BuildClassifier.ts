import type { BuildClassification, EnvironmentSignals } from "@ciplan/shared";
import type { CommitLogReader, PipelineVariableStore } from "@ciplan/integrations";
import { createClassificationAmbiguousError } from "../../errors/CiPolicyErrors.js";
import { GuardedRunLog, NoopRunLog, type RunLog } from "../../runtime/RunLogger.js";

export interface BuildClassifierOptions {
  workspaceRoot: string;
  vcs: CommitLogReader;
  variables: PipelineVariableStore;
  /** Case-insensitive regular expression matched against the commit message. */
  featureTagPattern: string;
  dailyBuildVariable: string;
  log?: RunLog;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Decides whether a run is a daily (full) build. Rules, first match wins:
 * schedule flag, then commit tag or manual override, then standard build.
 * `classify` never rejects; lookup and persistence failures are logged.
 */
export class BuildClassifier {
  private readonly featureTag: RegExp;
  private readonly log: RunLog;

  constructor(private readonly options: BuildClassifierOptions) {
    this.featureTag = new RegExp(options.featureTagPattern, "i");
    this.log = new GuardedRunLog(options.log ?? new NoopRunLog());
  }

  async classify(signals: EnvironmentSignals): Promise<BuildClassification> {
    const classification = await this.decide(signals);
    await this.log.log("classification", { ...classification, commitId: signals.commitId ?? null });
    return classification;
  }

  private async decide(signals: EnvironmentSignals): Promise<BuildClassification> {
    if (signals.scheduled) {
      return { isDaily: true, reason: "ScheduledTrigger" };
    }
    const message = await this.readCommitMessage(signals.commitId);
    const tagged = message !== null && this.featureTag.test(message);
    if (tagged || signals.forceFeature) {
      const classification: BuildClassification = {
        isDaily: true,
        reason: tagged ? "CommitTag" : "ManualOverride",
      };
      await this.persist();
      return classification;
    }
    return { isDaily: false, reason: "None" };
  }

  private async readCommitMessage(commitId: string | undefined): Promise<string | null> {
    if (!commitId) return null;
    try {
      const message = await this.options.vcs.commitMessage(this.options.workspaceRoot, commitId);
      if (message === null) {
        await this.warn(createClassificationAmbiguousError("No commit message available.", commitId).message, commitId);
      }
      return message;
    } catch (error) {
      await this.warn(createClassificationAmbiguousError(errorMessage(error), commitId).message, commitId);
      return null;
    }
  }

  private async persist(): Promise<void> {
    const name = this.options.dailyBuildVariable;
    try {
      await this.options.variables.set(name, "true");
    } catch (error) {
      await this.log.log("variable_write_failed", { name, error: errorMessage(error) });
    }
  }

  private async warn(message: string, commitId: string): Promise<void> {
    await this.log.log("classification_warning", { code: "classification_ambiguous", commitId, message });
  }
}
