import fs from "node:fs/promises";

export interface NunitSummary {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
}

const readAttributes = (tag: string): Map<string, string> => {
  const attributes = new Map<string, string>();
  const pattern = /([\w:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
  for (const match of tag.matchAll(pattern)) {
    attributes.set(match[1], match[2] ?? match[3] ?? "");
  }
  return attributes;
};

const count = (attributes: Map<string, string>, name: string): number => {
  const raw = attributes.get(name);
  if (raw === undefined || raw.trim() === "") return 0;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid NUnit attribute ${name}="${raw}"`);
  }
  return value;
};

/**
 * Reads the root counters of an NUnit report. Both the NUnit 2 `test-results`
 * root and the NUnit 3 `test-run` root are understood.
 */
export const parseNunitSummary = (xml: string): NunitSummary => {
  const v2 = /<test-results\b([^>]*)>/.exec(xml);
  if (v2) {
    const attributes = readAttributes(v2[1]);
    const total = count(attributes, "total");
    const failed = count(attributes, "failures") + count(attributes, "errors");
    const skipped =
      count(attributes, "not-run") +
      count(attributes, "skipped") +
      count(attributes, "ignored") +
      count(attributes, "inconclusive") +
      count(attributes, "invalid");
    return { total, failed, skipped, passed: Math.max(0, total - failed - skipped) };
  }
  const v3 = /<test-run\b([^>]*)>/.exec(xml);
  if (v3) {
    const attributes = readAttributes(v3[1]);
    const total = count(attributes, "total");
    const failed = count(attributes, "failed");
    const skipped = count(attributes, "skipped") + count(attributes, "inconclusive");
    const passed = attributes.has("passed") ? count(attributes, "passed") : Math.max(0, total - failed - skipped);
    return { total, failed, skipped, passed };
  }
  throw new Error("No test-results or test-run element found in NUnit report");
};

export const readNunitSummary = async (filePath: string): Promise<NunitSummary> => {
  const xml = await fs.readFile(filePath, "utf8");
  try {
    return parseNunitSummary(xml);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${filePath}: ${message}`);
  }
};
