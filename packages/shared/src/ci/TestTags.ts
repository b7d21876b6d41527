export type TestTag = "CI" | "Feature" | "Scenario" | "Slow" | "RequireAdminOnWindows" | "RequireSudoOnUnix";

export const TEST_TAGS: readonly TestTag[] = [
  "CI",
  "Feature",
  "Scenario",
  "Slow",
  "RequireAdminOnWindows",
  "RequireSudoOnUnix",
];

export interface TestTagSet {
  readonly include: ReadonlySet<TestTag>;
  readonly exclude: ReadonlySet<TestTag>;
}

export const isTestTag = (value: unknown): value is TestTag =>
  typeof value === "string" && (TEST_TAGS as readonly string[]).includes(value);

/**
 * Builds a tag set. A tag listed on both sides is kept only in `exclude`,
 * so the include/exclude sides never overlap.
 */
export const createTagSet = (include: Iterable<TestTag>, exclude: Iterable<TestTag> = []): TestTagSet => {
  const excluded = new Set(exclude);
  const included = new Set<TestTag>();
  for (const tag of include) {
    if (!excluded.has(tag)) included.add(tag);
  }
  return { include: included, exclude: excluded };
};

export const withExcluded = (tagSet: TestTagSet, ...tags: TestTag[]): TestTagSet =>
  createTagSet(tagSet.include, [...tagSet.exclude, ...tags]);

export const onlyIncluding = (tagSet: TestTagSet, ...tags: TestTag[]): TestTagSet =>
  createTagSet(tags, [...tagSet.exclude].filter((tag) => !tags.includes(tag)));

// Stable order for display and command lines.
export const sortTags = (tags: ReadonlySet<TestTag>): TestTag[] =>
  TEST_TAGS.filter((tag) => tags.has(tag));

export const tagSetToJson = (tagSet: TestTagSet): { include: TestTag[]; exclude: TestTag[] } => ({
  include: sortTags(tagSet.include),
  exclude: sortTags(tagSet.exclude),
});
