import fs from "node:fs/promises";

export type VariableStoreKind = "azure" | "github" | "process";

export type VariableStoreSelection = VariableStoreKind | "auto";

export const VARIABLE_STORE_SELECTIONS: readonly VariableStoreSelection[] = ["auto", "azure", "github", "process"];

/**
 * Cross-stage build variables. Every store also mirrors the value into the
 * given env record so steps later in the same process observe it.
 */
export interface PipelineVariableStore {
  readonly kind: VariableStoreKind;
  set(name: string, value: string): Promise<void>;
}

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_.]*$/;

const assertVariable = (name: string, value: string): void => {
  if (!VARIABLE_NAME.test(name)) {
    throw new Error(`Invalid pipeline variable name: ${JSON.stringify(name)}`);
  }
  if (/[\r\n]/.test(value)) {
    throw new Error(`Pipeline variable ${name} cannot contain line breaks`);
  }
};

export class ProcessVariableStore implements PipelineVariableStore {
  readonly kind: VariableStoreKind = "process";

  constructor(protected readonly env: NodeJS.ProcessEnv = process.env) {}

  async set(name: string, value: string): Promise<void> {
    assertVariable(name, value);
    this.env[name] = value;
  }
}

/** Emits `##vso[task.setvariable]` logging commands for Azure Pipelines. */
export class AzurePipelinesVariableStore extends ProcessVariableStore {
  override readonly kind: VariableStoreKind = "azure";

  constructor(
    private readonly writeLine: (line: string) => void = (line) => {
      process.stdout.write(`${line}\n`);
    },
    env: NodeJS.ProcessEnv = process.env,
  ) {
    super(env);
  }

  override async set(name: string, value: string): Promise<void> {
    await super.set(name, value);
    this.writeLine(`##vso[task.setvariable variable=${name}]${value}`);
  }
}

/** Appends `NAME=value` lines to the file GitHub Actions names in GITHUB_ENV. */
export class GithubEnvVariableStore extends ProcessVariableStore {
  override readonly kind: VariableStoreKind = "github";

  constructor(
    private readonly envFilePath: string,
    env: NodeJS.ProcessEnv = process.env,
  ) {
    super(env);
  }

  override async set(name: string, value: string): Promise<void> {
    await super.set(name, value);
    await fs.appendFile(this.envFilePath, `${name}=${value}\n`, "utf8");
  }
}

export const isVariableStoreSelection = (value: unknown): value is VariableStoreSelection =>
  typeof value === "string" && (VARIABLE_STORE_SELECTIONS as readonly string[]).includes(value);

export const resolveVariableStoreKind = (
  selection: VariableStoreSelection,
  env: NodeJS.ProcessEnv,
): VariableStoreKind => {
  if (selection !== "auto") return selection;
  if ((env.TF_BUILD ?? "").toLowerCase() === "true") return "azure";
  if (env.GITHUB_ENV) return "github";
  return "process";
};

export const createVariableStore = (
  selection: VariableStoreSelection,
  env: NodeJS.ProcessEnv = process.env,
): PipelineVariableStore => {
  const kind = resolveVariableStoreKind(selection, env);
  switch (kind) {
    case "azure":
      return new AzurePipelinesVariableStore(undefined, env);
    case "github": {
      const envFile = env.GITHUB_ENV;
      if (!envFile) {
        throw new Error("GITHUB_ENV is not set; cannot use the github variable store");
      }
      return new GithubEnvVariableStore(envFile, env);
    }
    case "process":
      return new ProcessVariableStore(env);
  }
};
