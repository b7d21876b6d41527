import { promises as fs } from "node:fs";
import path from "node:path";

export type RunEventType =
  | "classification"
  | "classification_warning"
  | "variable_write_failed"
  | "plan"
  | "invocation_started"
  | "invocation_finished"
  | "partition_failed"
  | "verdict";

export interface RunLogEvent {
  type: RunEventType;
  timestamp: string;
  data: Record<string, unknown>;
}

export interface RunLog {
  log(type: RunEventType, data: Record<string, unknown>): Promise<void>;
}

/** Discards events; used when run logging is switched off. */
export class NoopRunLog implements RunLog {
  async log(): Promise<void> {}
}

/**
 * Forwards events to another log. A write that fails becomes a process
 * warning, so run logging can never abort a stage.
 */
export class GuardedRunLog implements RunLog {
  constructor(private readonly inner: RunLog) {}

  async log(type: RunEventType, data: Record<string, unknown>): Promise<void> {
    try {
      await this.inner.log(type, data);
    } catch (error) {
      process.emitWarning(`ciplan: could not write run log: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

export class RunLogger implements RunLog {
  readonly logPath: string;
  readonly logDir: string;
  readonly runId: string;

  constructor(workspaceRoot: string, logDir: string, runId: string) {
    const resolvedDir = path.resolve(workspaceRoot, logDir);
    this.logDir = resolvedDir;
    this.runId = runId;
    this.logPath = path.join(resolvedDir, `${runId}.jsonl`);
  }

  async log(type: RunEventType, data: Record<string, unknown>): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    const event: RunLogEvent = {
      type,
      timestamp: new Date().toISOString(),
      data,
    };
    await fs.appendFile(this.logPath, `${JSON.stringify(event)}\n`, "utf8");
  }
}

export const createRunId = (now: Date = new Date()): string =>
  `run-${now.toISOString().replace(/[:.]/g, "-")}-${process.pid}`;
