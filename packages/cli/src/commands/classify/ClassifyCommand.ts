import { createCiServices, readEnvironmentSignals } from "@ciplan/core";
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

export interface ClassifyArgs extends CommonArgs {
  schedule?: boolean;
  forceFeature?: boolean;
  commit?: string;
}

const usage = `ciplan classify ${COMMON_USAGE} \\
  [--schedule] [--force-feature] [--commit <SHA>]`;

export const parseClassifyArgs = (argv: string[]): ClassifyArgs => {
  const parsed: ClassifyArgs = createCommonArgs();
  const cursor = new ArgCursor(argv);
  for (let current = cursor.next(); current; current = cursor.next()) {
    const { flag, inline } = current;
    if (applyCommonFlag(parsed, flag, inline, cursor)) continue;
    switch (flag) {
      case "--schedule":
        parsed.schedule = true;
        break;
      case "--force-feature":
        parsed.forceFeature = true;
        break;
      case "--commit":
        parsed.commit = cursor.value(flag, inline);
        break;
      default:
        throw unknownOption("classify", flag);
    }
  }
  return parsed;
};

export class ClassifyCommand {
  static async run(argv: string[], context: CommandContext = {}): Promise<void> {
    const parsed = parseClassifyArgs(argv);
    const write = outputFor(context);
    if (parsed.help) {
      write(usage);
      return;
    }
    const env = context.env ?? process.env;
    const config = await loadCommandConfig(parsed, context);
    const { classifier } = createCiServices(config, env, context.collaborators);
    const signals = readEnvironmentSignals(env);
    if (parsed.schedule) signals.scheduled = true;
    if (parsed.forceFeature) signals.forceFeature = true;
    if (parsed.commit) signals.commitId = parsed.commit;

    const classification = await classifier.classify(signals);
    if (parsed.json) {
      printJson(write, classification);
      return;
    }
    write(classification.isDaily ? `Daily build (${classification.reason})` : "Standard build");
  }
}
