import path from "node:path";
import { loadConfig, type CiCollaborators, type CiplanConfig, type ConfigSource } from "@ciplan/core";
import { isVariableStoreSelection } from "@ciplan/integrations";
import { PLATFORMS, PRIVILEGE_MODES, isPlatform, isPrivilegeMode } from "@ciplan/shared";

/** What a command reads from its surroundings; tests pass their own. */
export interface CommandContext {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  collaborators?: CiCollaborators;
  write?: (line: string) => void;
}

export interface CommonArgs {
  workspaceRoot?: string;
  configPath?: string;
  platform?: CiplanConfig["platform"];
  privilegeMode?: CiplanConfig["privilegeMode"];
  configuration?: string;
  variableStore?: CiplanConfig["variableStore"];
  json: boolean;
  help: boolean;
}

export const COMMON_USAGE =
  "[--workspace-root <PATH>] [--config <FILE>] [--platform windows|linux|macos] [--configuration <NAME>] [--variable-store auto|azure|github|process] [--json]";

export const splitFlag = (arg: string): { flag: string; inline?: string } => {
  const eq = arg.indexOf("=");
  if (!arg.startsWith("--") || eq < 0) return { flag: arg };
  return { flag: arg.slice(0, eq), inline: arg.slice(eq + 1) };
};

/** Returns the value for `flag`, taken inline (`--x=v`) or from the next argument. */
export class ArgCursor {
  private index = 0;

  constructor(private readonly argv: readonly string[]) {}

  next(): { flag: string; inline?: string } | undefined {
    if (this.index >= this.argv.length) return undefined;
    const arg = this.argv[this.index];
    this.index += 1;
    return splitFlag(arg);
  }

  value(flag: string, inline?: string): string {
    if (inline !== undefined) return inline;
    const value = this.argv[this.index];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for ${flag}`);
    }
    this.index += 1;
    return value;
  }
}

export const createCommonArgs = (): CommonArgs => ({ json: false, help: false });

/** Applies a flag every command accepts; returns false when `flag` is not one of them. */
export const applyCommonFlag = (parsed: CommonArgs, flag: string, inline: string | undefined, cursor: ArgCursor): boolean => {
  switch (flag) {
    case "--workspace":
    case "--workspace-root":
      parsed.workspaceRoot = path.resolve(cursor.value(flag, inline));
      return true;
    case "--config":
      parsed.configPath = path.resolve(cursor.value(flag, inline));
      return true;
    case "--platform": {
      const value = cursor.value(flag, inline);
      if (!isPlatform(value)) throw new Error(`Invalid --platform ${value} (expected ${PLATFORMS.join("|")})`);
      parsed.platform = value;
      return true;
    }
    case "--privilege-mode": {
      const value = cursor.value(flag, inline);
      if (!isPrivilegeMode(value)) {
        throw new Error(`Invalid --privilege-mode ${value} (expected ${PRIVILEGE_MODES.join("|")})`);
      }
      parsed.privilegeMode = value;
      return true;
    }
    case "--configuration":
      parsed.configuration = cursor.value(flag, inline);
      return true;
    case "--variable-store": {
      const value = cursor.value(flag, inline);
      if (!isVariableStoreSelection(value)) throw new Error(`Invalid --variable-store ${value}`);
      parsed.variableStore = value;
      return true;
    }
    case "--json":
      parsed.json = true;
      return true;
    case "--help":
    case "-h":
      parsed.help = true;
      return true;
    default:
      return false;
  }
};

export const unknownOption = (command: string, flag: string): Error =>
  new Error(`Unknown option for ciplan ${command}: ${flag}`);

export const loadCommandConfig = async (parsed: CommonArgs, context: CommandContext): Promise<CiplanConfig> => {
  const cli: ConfigSource = {
    workspaceRoot: parsed.workspaceRoot,
    platform: parsed.platform,
    privilegeMode: parsed.privilegeMode,
    configuration: parsed.configuration,
    variableStore: parsed.variableStore,
  };
  return loadConfig({
    cwd: parsed.workspaceRoot ?? context.cwd ?? process.cwd(),
    env: context.env ?? process.env,
    configPath: parsed.configPath,
    cli,
  });
};

export const outputFor = (context: CommandContext): ((line: string) => void) =>
  context.write ??
  ((line: string) => {
    // eslint-disable-next-line no-console
    console.log(line);
  });

export const printJson = (write: (line: string) => void, value: unknown): void => {
  write(JSON.stringify(value, null, 2));
};

const pad = (value: string, width: number): string => value.padEnd(width, " ");

export const formatTable = (headers: string[], rows: string[][]): string => {
  const widths = headers.map((header, idx) => Math.max(header.length, ...rows.map((row) => (row[idx] ?? "").length)));
  const headerLine = headers.map((h, idx) => pad(h, widths[idx])).join(" | ");
  const sepLine = widths.map((w) => "-".repeat(w)).join("-+-");
  const body = rows.map((row) => row.map((cell, idx) => pad(cell ?? "", widths[idx])).join(" | ")).join("\n");
  return [headerLine, sepLine, body].filter(Boolean).join("\n").replace(/ +$/gm, "");
};
