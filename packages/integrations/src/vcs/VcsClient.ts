import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";

const execFile = promisify(execFileCb);

export interface CommitLogReader {
  commitMessage(cwd: string, commitId: string): Promise<string | null>;
}

/**
 * Read-only git queries. Every lookup reports a failure as `null` rather
 * than throwing: callers treat a missing message as "no signal".
 */
export class VcsClient implements CommitLogReader {
  protected async runGit(cwd: string, args: string[]): Promise<{ stdout: string; stderr: string }> {
    const { stdout, stderr } = await execFile("git", args, { cwd });
    return { stdout, stderr };
  }

  async commitMessage(cwd: string, commitId: string): Promise<string | null> {
    const ref = commitId.trim();
    // refuse anything git could read as an option
    if (!ref || ref.startsWith("-")) return null;
    try {
      const { stdout } = await this.runGit(cwd, ["log", "--format=%B", "-n", "1", ref]);
      const message = stdout.replace(/\s+$/, "");
      return message.length ? message : null;
    } catch {
      return null;
    }
  }
}
