export type CiPolicyErrorCode =
  | "classification_ambiguous"
  | "missing_artifact"
  | "test_partition_failed"
  | "aggregation_failed"
  | "invalid_metadata";

export type CiPolicyErrorDetails = Record<string, unknown>;

type CiPolicyErrorInput = {
  code: CiPolicyErrorCode;
  message: string;
  remediation: string[];
  details?: CiPolicyErrorDetails;
  name?: string;
};

export class CiPolicyError extends Error {
  readonly code: CiPolicyErrorCode;
  readonly remediation: string[];
  readonly details?: CiPolicyErrorDetails;

  constructor({ code, message, remediation, details, name }: CiPolicyErrorInput) {
    super(message);
    this.name = name ?? "CiPolicyError";
    this.code = code;
    this.remediation = remediation;
    this.details = details;
  }
}

export const isCiPolicyError = (error: unknown, code?: CiPolicyErrorCode): error is CiPolicyError =>
  error instanceof CiPolicyError && (code === undefined || error.code === code);

/** Logged, never thrown: classification falls back to a standard build. */
export const createClassificationAmbiguousError = (cause: string, commitId?: string): CiPolicyError =>
  new CiPolicyError({
    code: "classification_ambiguous",
    message: `Could not read commit metadata${commitId ? ` for ${commitId}` : ""}; treating the run as a standard build. ${cause}`,
    remediation: ["Check that the agent has a full clone of the commit being built."],
    details: { commitId, cause },
    name: "ClassificationAmbiguousError",
  });

export const createMissingArtifactError = (input: {
  configuration: string;
  expectedPath?: string;
}): CiPolicyError =>
  new CiPolicyError({
    code: "missing_artifact",
    message: `CI build failed: test host not found for configuration ${input.configuration}${
      input.expectedPath ? ` (expected ${input.expectedPath})` : ""
    }`,
    remediation: [
      "Run the build step before the test step.",
      "Point artifact.path or artifact.dir at the build output.",
    ],
    details: { ...input },
    name: "MissingArtifactError",
  });

export const createTestPartitionFailedError = (label: string, cause: string): CiPolicyError =>
  new CiPolicyError({
    code: "test_partition_failed",
    message: `Test partition ${label} did not complete: ${cause}`,
    remediation: ["Inspect the host output for this partition; the remaining partitions still ran."],
    details: { label, cause },
    name: "TestPartitionFailedError",
  });

export const createAggregationFailedError = (reasons: string[]): CiPolicyError =>
  new CiPolicyError({
    code: "aggregation_failed",
    message: [`Tests failed (${reasons.length} violation${reasons.length === 1 ? "" : "s"}):`, ...reasons.map((r) => `- ${r}`)].join(
      "\n",
    ),
    remediation: ["Fix the failing partitions listed above and re-run."],
    details: { reasons },
    name: "AggregationFailedError",
  });

export const createInvalidMetadataError = (source: string, problem: string): CiPolicyError =>
  new CiPolicyError({
    code: "invalid_metadata",
    message: `Invalid test metadata in ${source}: ${problem}`,
    remediation: ['Use the shape { "ExperimentalFeatures": { "<name>": ["<test file>", ...] } }.'],
    details: { source, problem },
    name: "InvalidMetadataError",
  });
