import { createHash } from "crypto";

export type KeyComponent =
  | string
  | number
  | boolean
  | null
  | undefined
  | KeyComponent[]
  | { [key: string]: KeyComponent };

export const sha256 = (input: string): string => createHash("sha256").update(input).digest("hex");

/**
 * Canonical JSON: object keys sorted recursively, undefined members dropped.
 * Arrays keep their order unless `unordered` is set, in which case their
 * canonical members are sorted too.
 */
export const canonicalize = (value: KeyComponent, unordered = false): string => {
  if (value === undefined || value === null) return "null";
  if (Array.isArray(value)) {
    const members = value.map((member) => canonicalize(member, unordered));
    if (unordered) members.sort();
    return `[${members.join(",")}]`;
  }
  if (typeof value === "object") {
    const entries = Object.keys(value)
      .filter((key) => value[key] !== undefined)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalize(value[key], unordered)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
};

/**
 * Derives a cache key from a namespace and the logical inputs of a lookup.
 * Reordering object properties (or set-like arrays, with `unordered`) never changes the key.
 */
export const deriveCacheKey = (
  namespace: string,
  components: Record<string, KeyComponent>,
  opts: { unordered?: boolean } = {}
): string => sha256(`${namespace}|${canonicalize(components, opts.unordered ?? false)}`);
