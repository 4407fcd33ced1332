import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";

export const ensureDir = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

export const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

/**
 * Writes to a sibling temp file and renames it over the target, so readers
 * only ever observe the old or the new content.
 */
export const writeFileAtomic = async (filePath: string, contents: string | Uint8Array): Promise<void> => {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await fs.writeFile(tempPath, contents, typeof contents === "string" ? "utf-8" : undefined);
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
};

export const writeJsonAtomic = async (filePath: string, payload: unknown): Promise<void> =>
  writeFileAtomic(filePath, `${JSON.stringify(payload, null, 2)}\n`);

/** Returns undefined when the file does not exist; other I/O and parse errors propagate. */
export const readJsonIfExists = async (filePath: string): Promise<unknown> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  return parsed;
};

export const isNotFound = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
