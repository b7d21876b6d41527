import { execFile as execFileCb } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import { PathHelper, sortTags, type TestInvocationSpec, type TestRunResult } from "@ciplan/shared";
import { readNunitSummary } from "./NunitResultReader.js";
import type { TestEngine, TestEngineContext } from "./TestEngineTypes.js";

const execFile = promisify(execFileCb);

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface HostLaunch {
  command: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export interface HostExit {
  exitCode: number;
  stdout: string;
  stderr: string;
}

const quote = (value: string): string => `'${value.replace(/'/g, "''")}'`;

const quoteList = (values: readonly string[]): string => values.map(quote).join(",");

export const buildPesterCommand = (spec: TestInvocationSpec, testPaths: readonly string[], outputFile: string): string => {
  const parts = ["Invoke-Pester", "-Path", quoteList(testPaths)];
  const include = sortTags(spec.tagSet.include);
  const exclude = sortTags(spec.tagSet.exclude);
  if (include.length) parts.push("-Tag", quoteList(include));
  if (exclude.length) parts.push("-ExcludeTag", quoteList(exclude));
  parts.push("-OutputFormat", "NUnitXml", "-OutputFile", quote(outputFile));
  return parts.join(" ");
};

const tail = (text: string, lines = 20): string => text.trimEnd().split(/\r?\n/).slice(-lines).join("\n");

/**
 * Runs one partition of the corpus inside the compiled host and reads the
 * NUnit report it leaves behind. The host's exit code is not trusted; the
 * report is the only source of pass/fail counts.
 */
export class PesterTestEngine implements TestEngine {
  protected async runHost(launch: HostLaunch): Promise<HostExit> {
    try {
      const { stdout, stderr } = await execFile(launch.command, launch.args, {
        cwd: launch.cwd,
        env: launch.env,
        maxBuffer: MAX_OUTPUT_BYTES,
      });
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      // a non-zero exit still carries output; spawn failures (ENOENT, EACCES) have a string code
      if (error instanceof Error && "code" in error && typeof error.code === "number") {
        return {
          exitCode: error.code,
          stdout: "stdout" in error && typeof error.stdout === "string" ? error.stdout : "",
          stderr: "stderr" in error && typeof error.stderr === "string" ? error.stderr : "",
        };
      }
      throw error;
    }
  }

  protected async writeSettings(settingsFile: string, feature: string): Promise<void> {
    await fs.writeFile(settingsFile, `${JSON.stringify({ ExperimentalFeatures: [feature] }, null, 2)}\n`, "utf8");
  }

  async prepareLaunch(spec: TestInvocationSpec, ctx: TestEngineContext): Promise<{ launch: HostLaunch; outputFile: string }> {
    await PathHelper.ensureDir(ctx.resultsDir);
    const outputFile = PathHelper.resultFileFor(ctx.resultsDir, spec.outputLabel);
    await fs.rm(outputFile, { force: true });
    const testPaths =
      spec.scope.kind === "files"
        ? spec.scope.files.map((file) => path.resolve(ctx.workspaceRoot, file))
        : [path.resolve(ctx.workspaceRoot, ctx.testRoot)];
    const hostArgs = ["-NoProfile"];
    if (spec.experimentalFeature) {
      const settingsFile = path.join(ctx.resultsDir, `${path.basename(outputFile, ".xml")}.settings.json`);
      await this.writeSettings(settingsFile, spec.experimentalFeature);
      hostArgs.push("-SettingsFile", settingsFile);
    }
    hostArgs.push("-Command", buildPesterCommand(spec, testPaths, outputFile));
    const viaSudo = spec.privilege === "elevated" && ctx.platform !== "windows";
    return {
      outputFile,
      launch: {
        command: viaSudo ? "sudo" : ctx.hostPath,
        args: viaSudo ? [ctx.hostPath, ...hostArgs] : hostArgs,
        cwd: ctx.workspaceRoot,
        env: ctx.env,
      },
    };
  }

  async invoke(spec: TestInvocationSpec, ctx: TestEngineContext): Promise<TestRunResult> {
    const { launch, outputFile } = await this.prepareLaunch(spec, ctx);
    const exit = await this.runHost(launch);
    try {
      const summary = await readNunitSummary(outputFile);
      return {
        label: spec.outputLabel,
        passed: summary.passed,
        failed: summary.failed,
        allowEmptyResult: spec.allowEmptyResult,
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const stderr = tail(exit.stderr);
      return {
        label: spec.outputLabel,
        passed: 0,
        failed: 0,
        allowEmptyResult: spec.allowEmptyResult,
        error: `No readable test report (host exit code ${exit.exitCode}): ${reason}${stderr ? `\n${stderr}` : ""}`,
      };
    }
  }
}
