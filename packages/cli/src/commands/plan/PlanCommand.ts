import {
  createCiServices,
  describeInvocation,
  loadExperimentalFeatures,
  readEnvironmentSignals,
} from "@ciplan/core";
import { sortTags, type TestInvocationSpec } from "@ciplan/shared";
import {
  ArgCursor,
  COMMON_USAGE,
  applyCommonFlag,
  createCommonArgs,
  formatTable,
  loadCommandConfig,
  outputFor,
  printJson,
  unknownOption,
  type CommandContext,
  type CommonArgs,
} from "../shared/CommandSupport.js";

const usage = `ciplan plan ${COMMON_USAGE} \\
  [--privilege-mode all|unelevated|elevated]`;

export const parsePlanArgs = (argv: string[]): CommonArgs => {
  const parsed = createCommonArgs();
  const cursor = new ArgCursor(argv);
  for (let current = cursor.next(); current; current = cursor.next()) {
    if (!applyCommonFlag(parsed, current.flag, current.inline, cursor)) {
      throw unknownOption("plan", current.flag);
    }
  }
  return parsed;
};

const tagsCell = (tags: string[]): string => (tags.length ? tags.join(",") : "-");

export const planRows = (invocations: readonly TestInvocationSpec[]): string[][] =>
  invocations.map((spec) => [
    spec.outputLabel,
    spec.privilege,
    tagsCell(sortTags(spec.tagSet.include)),
    tagsCell(sortTags(spec.tagSet.exclude)),
    spec.scope.kind === "files" ? spec.scope.files.join(",") : "all tests",
  ]);

export class PlanCommand {
  static async run(argv: string[], context: CommandContext = {}): Promise<void> {
    const parsed = parsePlanArgs(argv);
    const write = outputFor(context);
    if (parsed.help) {
      write(usage);
      return;
    }
    const env = context.env ?? process.env;
    const config = await loadCommandConfig(parsed, context);
    const { classifier, planner } = createCiServices(config, env, context.collaborators);
    const classification = await classifier.classify(readEnvironmentSignals(env));
    const experimentalFeatures = await loadExperimentalFeatures({
      workspaceRoot: config.workspaceRoot,
      metadataPath: config.tests.metadataPath,
      inline: config.experimentalFeatures,
    });
    const plan = await planner.plan({
      classification,
      platform: config.platform,
      privilegeMode: config.privilegeMode,
      experimentalFeatures,
    });

    if (parsed.json) {
      printJson(write, {
        classification,
        platform: config.platform,
        hostPath: plan.hostPath,
        invocations: plan.invocations.map(describeInvocation),
      });
      return;
    }
    write(`${classification.isDaily ? `Daily build (${classification.reason})` : "Standard build"} on ${config.platform}`);
    write(`Test host: ${plan.hostPath}`);
    write(formatTable(["LABEL", "PRIVILEGE", "INCLUDE", "EXCLUDE", "SCOPE"], planRows(plan.invocations)));
  }
}
