import type { EnvironmentSignals } from "@ciplan/shared";
import { parseBoolean } from "../../config/ConfigLoader.js";

const firstNonEmpty = (...values: Array<string | undefined>): string | undefined => {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
};

/**
 * Reads the classification signals from an env record. Azure Pipelines and
 * GitHub Actions spellings are both understood.
 */
export const readEnvironmentSignals = (env: NodeJS.ProcessEnv): EnvironmentSignals => {
  const scheduled =
    (env.BUILD_REASON ?? "").trim().toLowerCase() === "schedule" ||
    (env.GITHUB_EVENT_NAME ?? "").trim().toLowerCase() === "schedule";
  const signals: EnvironmentSignals = {
    scheduled,
    forceFeature: parseBoolean(env.FORCE_FEATURE) ?? false,
  };
  const commitId = firstNonEmpty(env.BUILD_SOURCEVERSION, env.GITHUB_SHA);
  if (commitId) signals.commitId = commitId;
  return signals;
};

/**
 * Daily status as a stage after classification sees it: a scheduled trigger
 * is read again from the environment, any other daily reason from the
 * variable the classifier persisted.
 */
export const readDailyBuildFlag = (env: NodeJS.ProcessEnv, dailyBuildVariable: string): boolean =>
  readEnvironmentSignals(env).scheduled || parseBoolean(env[dailyBuildVariable]) === true;
