import path from "node:path";
import { createAggregationFailedError, createCiServices } from "@ciplan/core";
import { readNunitSummary } from "@ciplan/integrations";
import type { TestRunResult } from "@ciplan/shared";
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

export interface ResultFileArg {
  file: string;
  allowEmptyResult: boolean;
}

export interface AggregateArgs extends CommonArgs {
  results: ResultFileArg[];
}

const usage = `ciplan aggregate ${COMMON_USAGE} \\
  --result <NUNIT_XML> ... [--allow-empty <NUNIT_XML> ...]`;

export const parseAggregateArgs = (argv: string[]): AggregateArgs => {
  const parsed: AggregateArgs = { ...createCommonArgs(), results: [] };
  const cursor = new ArgCursor(argv);
  for (let current = cursor.next(); current; current = cursor.next()) {
    const { flag, inline } = current;
    if (applyCommonFlag(parsed, flag, inline, cursor)) continue;
    switch (flag) {
      case "--result":
        parsed.results.push({ file: cursor.value(flag, inline), allowEmptyResult: false });
        break;
      case "--allow-empty":
        parsed.results.push({ file: cursor.value(flag, inline), allowEmptyResult: true });
        break;
      default:
        throw unknownOption("aggregate", flag);
    }
  }
  return parsed;
};

/** `results/FeatureA-ElevatedTests.xml` is reported as `FeatureA-ElevatedTests`. */
export const labelForResultFile = (file: string): string => path.basename(file, path.extname(file));

export const readResultFile = async (workspaceRoot: string, arg: ResultFileArg): Promise<TestRunResult> => {
  const label = labelForResultFile(arg.file);
  try {
    const summary = await readNunitSummary(path.resolve(workspaceRoot, arg.file));
    return { label, passed: summary.passed, failed: summary.failed, allowEmptyResult: arg.allowEmptyResult };
  } catch (error) {
    return {
      label,
      passed: 0,
      failed: 0,
      allowEmptyResult: arg.allowEmptyResult,
      error: error instanceof Error ? error.message : String(error),
    };
  }
};

export class AggregateCommand {
  static async run(argv: string[], context: CommandContext = {}): Promise<void> {
    const parsed = parseAggregateArgs(argv);
    const write = outputFor(context);
    if (parsed.help) {
      write(usage);
      return;
    }
    if (!parsed.results.length) {
      throw new Error(`ciplan aggregate needs at least one result file\n${usage}`);
    }
    const env = context.env ?? process.env;
    const config = await loadCommandConfig(parsed, context);
    const { aggregator } = createCiServices(config, env, context.collaborators);
    const results: TestRunResult[] = [];
    for (const arg of parsed.results) {
      results.push(await readResultFile(config.workspaceRoot, arg));
    }
    const verdict = await aggregator.aggregate(results);
    if (parsed.json) {
      printJson(write, { results, verdict });
    } else if (verdict.status === "pass") {
      write(`Verdict: pass (${results.length} result files); ${config.variables.testsPassed}=true`);
    }
    if (verdict.status === "fail") {
      throw createAggregationFailedError(verdict.reasons);
    }
  }
}
