import fs from "node:fs/promises";
import path from "node:path";
import type { ExperimentalFeatureMap } from "@ciplan/shared";
import { normalizeFeatureMap } from "../../config/ConfigLoader.js";
import { createInvalidMetadataError } from "../../errors/CiPolicyErrors.js";

export interface ExperimentalFeatureSource {
  workspaceRoot: string;
  metadataPath: string;
  /** Inline map from the config file; wins over the metadata file. */
  inline?: Record<string, string[]>;
}

const toMap = (features: Record<string, string[]>): ExperimentalFeatureMap =>
  new Map(Object.entries(features).map(([name, files]) => [name, [...files]]));

/**
 * Parses `{ "ExperimentalFeatures": { name: [files] } }`. An empty file list
 * is kept as-is: it means the whole corpus, not "no tests".
 */
export const parseTestMetadata = (raw: unknown, source: string): ExperimentalFeatureMap => {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw createInvalidMetadataError(source, "expected a JSON object");
  }
  const features = "ExperimentalFeatures" in raw ? raw.ExperimentalFeatures : undefined;
  if (features === undefined || features === null) return new Map();
  const errors: string[] = [];
  const normalized = normalizeFeatureMap(features, "ExperimentalFeatures", errors);
  if (errors.length || !normalized) {
    throw createInvalidMetadataError(source, errors.join(", ") || "ExperimentalFeatures (expected object)");
  }
  return toMap(normalized);
};

export const loadExperimentalFeatures = async (source: ExperimentalFeatureSource): Promise<ExperimentalFeatureMap> => {
  if (source.inline) return toMap(source.inline);
  const metadataFile = path.resolve(source.workspaceRoot, source.metadataPath);
  let content: string;
  try {
    content = await fs.readFile(metadataFile, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return new Map();
    throw error;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw createInvalidMetadataError(metadataFile, error instanceof Error ? error.message : String(error));
  }
  return parseTestMetadata(raw, metadataFile);
};
