import path from "node:path";
import { promises as fs } from "node:fs";

/**
 * File locations for test reports.
 */
export class PathHelper {
  static resultFileFor(resultsDir: string, label: string): string {
    const safeLabel = label.replace(/[^a-z0-9_.-]/gi, "_");
    return path.join(resultsDir, `${safeLabel}.xml`);
  }

  static async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }
}
