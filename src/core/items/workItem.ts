export type WorkItem = {
  readonly id: string;
  readonly externalId?: string; // DOI-like identifier, when the source has one
  readonly title: string;
  readonly sourceLocation: string;
  readonly abstract?: string;
  readonly popularity?: number; // citation count or equivalent
  readonly publishedYear?: number;
  readonly metadata: Readonly<Record<string, unknown>>;
};

export type WorkItemInput = Omit<WorkItem, "metadata"> & { metadata?: Record<string, unknown> };

export class InvalidWorkItemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidWorkItemError";
  }
}

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

const parseOptionalNonNegative = (name: string, value: number | undefined): number | undefined => {
  if (value == null) return undefined;
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidWorkItemError(`Invalid work item: ${name} must be a non-negative number`);
  }
  return value;
};

/** Validates and freezes a discovered item. */
export const createWorkItem = (input: WorkItemInput): WorkItem => {
  const id = input.id.trim();
  if (id === "") throw new InvalidWorkItemError("Invalid work item: missing id");

  const sourceLocation = input.sourceLocation.trim();
  if (sourceLocation === "") {
    throw new InvalidWorkItemError(`Invalid work item ${id}: missing source location`);
  }

  const publishedYear = parseOptionalNonNegative("publishedYear", input.publishedYear);
  if (publishedYear != null && !Number.isInteger(publishedYear)) {
    throw new InvalidWorkItemError(`Invalid work item ${id}: publishedYear must be an integer`);
  }

  return Object.freeze({
    id,
    externalId: normalizeOptionalString(input.externalId),
    title: input.title.trim(),
    sourceLocation,
    abstract: normalizeOptionalString(input.abstract),
    popularity: parseOptionalNonNegative("popularity", input.popularity),
    publishedYear,
    metadata: Object.freeze({ ...(input.metadata ?? {}) })
  });
};
