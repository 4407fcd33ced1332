export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

export const optionalFiniteNumber = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

export const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((member) => typeof member === "string");
