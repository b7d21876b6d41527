#!/usr/bin/env node
import packageJson from "../../package.json" with { type: "json" };
import { isCiPolicyError } from "@ciplan/core";
import { AggregateCommand } from "../commands/aggregate/AggregateCommand.js";
import { ClassifyCommand } from "../commands/classify/ClassifyCommand.js";
import { PackagePlanCommand } from "../commands/packaging/PackagePlanCommand.js";
import { PlanCommand } from "../commands/plan/PlanCommand.js";
import { TestCommand } from "../commands/test/TestCommand.js";
import type { CommandContext } from "../commands/shared/CommandSupport.js";

const USAGE =
  "Usage: ciplan <classify|plan|test|aggregate|package-plan|version> [...args]\n" +
  "Run `ciplan <command> --help` for the options of a command.";

/** Message plus remediation hints, the way the CLI prints a failure. */
export const formatCliError = (error: unknown): string => {
  if (isCiPolicyError(error)) {
    return [error.message, ...error.remediation.map((hint) => `  hint: ${hint}`)].join("\n");
  }
  return error instanceof Error ? error.message : String(error);
};

export class CiplanEntrypoint {
  static async run(argv: string[] = process.argv.slice(2), context: CommandContext = {}): Promise<void> {
    const [command, ...rest] = argv;
    if (command === "--version" || command === "-v" || command === "version") {
      // eslint-disable-next-line no-console
      console.log(packageJson.version);
      return;
    }
    if (command === "--help" || command === "-h" || command === "help") {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return;
    }
    if (!command) {
      throw new Error(USAGE);
    }
    if (command === "classify") {
      await ClassifyCommand.run(rest, context);
      return;
    }
    if (command === "plan") {
      await PlanCommand.run(rest, context);
      return;
    }
    if (command === "test") {
      await TestCommand.run(rest, context);
      return;
    }
    if (command === "aggregate") {
      await AggregateCommand.run(rest, context);
      return;
    }
    if (command === "package-plan") {
      await PackagePlanCommand.run(rest, context);
      return;
    }
    throw new Error(`Unknown command: ${command}`);
  }

  static async main(argv: string[] = process.argv.slice(2)): Promise<void> {
    try {
      await CiplanEntrypoint.run(argv);
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error(formatCliError(error));
      process.exitCode = 1;
    }
  }
}

if (process.argv[1] && process.argv[1].endsWith("CiplanEntrypoint.ts")) {
  await CiplanEntrypoint.main();
}
