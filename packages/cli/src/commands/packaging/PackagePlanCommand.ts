import { decidePublish, packagePlanToJson, parseBoolean, planPackages, readDailyBuildFlag } from "@ciplan/core";
import type { Verdict } from "@ciplan/shared";
import {
  ArgCursor,
  COMMON_USAGE,
  applyCommonFlag,
  createCommonArgs,
  loadCommandConfig,
  outputFor,
  printJson,
  unknownOption,
  type CommandContext,
  type CommonArgs,
} from "../shared/CommandSupport.js";

export interface PackagePlanArgs extends CommonArgs {
  daily?: boolean;
  verdict?: Verdict["status"];
}

const usage = `ciplan package-plan ${COMMON_USAGE} \\
  [--daily | --standard] [--verdict pass|fail]`;

export const parsePackagePlanArgs = (argv: string[]): PackagePlanArgs => {
  const parsed: PackagePlanArgs = createCommonArgs();
  const cursor = new ArgCursor(argv);
  for (let current = cursor.next(); current; current = cursor.next()) {
    const { flag, inline } = current;
    if (applyCommonFlag(parsed, flag, inline, cursor)) continue;
    switch (flag) {
      case "--daily":
        parsed.daily = true;
        break;
      case "--standard":
        parsed.daily = false;
        break;
      case "--verdict": {
        const value = cursor.value(flag, inline);
        if (value !== "pass" && value !== "fail") throw new Error(`Invalid --verdict ${value} (expected pass|fail)`);
        parsed.verdict = value;
        break;
      }
      default:
        throw unknownOption("package-plan", flag);
    }
  }
  return parsed;
};

export class PackagePlanCommand {
  static async run(argv: string[], context: CommandContext = {}): Promise<void> {
    const parsed = parsePackagePlanArgs(argv);
    const write = outputFor(context);
    if (parsed.help) {
      write(usage);
      return;
    }
    const env = context.env ?? process.env;
    const config = await loadCommandConfig(parsed, context);
    const nextReleaseTag = config.release.nextReleaseTag;
    if (!nextReleaseTag) {
      throw new Error("release.nextReleaseTag is not set (config file or CIPLAN_NEXT_RELEASE_TAG)");
    }
    // Earlier stages hand their decisions over through pipeline variables.
    const classification = { isDaily: parsed.daily ?? readDailyBuildFlag(env, config.variables.dailyBuild) };
    const passed = parsed.verdict ? parsed.verdict === "pass" : parseBoolean(env[config.variables.testsPassed]) === true;
    const verdict: Verdict = passed ? { status: "pass", reasons: [] } : { status: "fail", reasons: [] };

    const plan = planPackages({
      classification,
      platform: config.platform,
      nextReleaseTag,
      buildId: config.release.buildId,
    });
    const decision = decidePublish(verdict, classification);

    if (parsed.json) {
      printJson(write, { isDaily: classification.isDaily, ...packagePlanToJson(plan), ...decision });
      return;
    }
    write(`Build: ${classification.isDaily ? "daily" : "standard"}`);
    write(`Release tag: ${plan.releaseTag}`);
    write(`Packages: ${[...plan.types].join(", ")}`);
    write(`Runtimes: ${[...plan.platformRuntimes].join(", ")}`);
    write(`Build packages: ${decision.buildPackages ? "yes" : "no"}`);
    write(`Publish to feed: ${decision.publishToFeed ? "yes" : "no"}`);
  }
}
