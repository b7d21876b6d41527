import fs from "node:fs/promises";
import path from "node:path";
import type { Platform } from "@ciplan/shared";

export interface BuildArtifactLocator {
  /** Path to the compiled test host for `configuration`, or null when it is not on disk. */
  locate(configuration: string): Promise<string | null>;
  /** Where `locate` looks, for error messages. */
  describeLocation?(configuration: string): string;
}

export interface FileSystemArtifactLocatorOptions {
  workspaceRoot: string;
  platform: Platform;
  artifactDir: string;
  executable?: string;
  /** Skips the `<artifactDir>/<configuration>` layout. */
  explicitPath?: string;
}

export const defaultHostExecutable = (platform: Platform): string =>
  platform === "windows" ? "pwsh.exe" : "pwsh";

export class FileSystemArtifactLocator implements BuildArtifactLocator {
  constructor(private readonly options: FileSystemArtifactLocatorOptions) {}

  describeLocation(configuration: string): string {
    const { workspaceRoot, explicitPath, artifactDir, platform } = this.options;
    if (explicitPath) return path.resolve(workspaceRoot, explicitPath);
    const executable = this.options.executable ?? defaultHostExecutable(platform);
    return path.resolve(workspaceRoot, artifactDir, configuration, executable);
  }

  async locate(configuration: string): Promise<string | null> {
    const candidate = this.describeLocation(configuration);
    try {
      const stat = await fs.stat(candidate);
      return stat.isFile() ? candidate : null;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }
}

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
