import { promises as fs } from "fs";
import path from "path";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import { CheckpointStorageError, toErrorMessage } from "../../shared/errors/pipeline.errors";
import { createLimiter } from "../../shared/concurrency/limiter";
import { isNotFound, readJsonIfExists, writeJsonAtomic } from "../../shared/fs/atomicWrite";
import { isRecord, isStringArray } from "../../shared/validation/guards";

// On-disk shape; field names are part of the file format.
type CheckpointFile = {
  run_id: string;
  processed_ids: string[];
};

const RUN_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

/**
 * One `<runId>.json` per run. Every write rewrites the whole file through a
 * temp file and rename; writes are serialized in process.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly writeLock = createLimiter(1);

  constructor(private readonly dir: string) {}

  async loadCompleted(runId: string): Promise<Set<string>> {
    const state = await this.read(runId);
    return new Set(state?.processed_ids ?? []);
  }

  recordCompleted(runId: string, itemId: string): Promise<void> {
    return this.recordCompletedMany(runId, [itemId]);
  }

  recordCompletedMany(runId: string, itemIds: Iterable<string>): Promise<void> {
    const ids = Array.from(itemIds);
    return this.writeLock(async () => {
      const state = (await this.read(runId)) ?? { run_id: runId, processed_ids: [] };
      const known = new Set(state.processed_ids);
      const added = ids.filter((id) => {
        if (known.has(id)) return false;
        known.add(id);
        return true;
      });
      if (added.length === 0) return;

      const next: CheckpointFile = { run_id: runId, processed_ids: [...state.processed_ids, ...added] };
      try {
        await writeJsonAtomic(this.pathFor(runId), next);
      } catch (err) {
        throw new CheckpointStorageError(runId, `Failed to write checkpoint for ${runId}: ${toErrorMessage(err)}`, err);
      }
    });
  }

  clear(runId: string): Promise<void> {
    return this.writeLock(async () => {
      await fs.rm(this.pathFor(runId), { force: true });
    });
  }

  async listRuns(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return names
      .filter((name) => name.endsWith(".json"))
      .map((name) => name.slice(0, -".json".length))
      .sort();
  }

  private pathFor(runId: string): string {
    if (!RUN_ID_PATTERN.test(runId)) {
      throw new CheckpointStorageError(runId, `Invalid run id: ${runId}`);
    }
    return path.join(this.dir, `${runId}.json`);
  }

  private async read(runId: string): Promise<CheckpointFile | undefined> {
    const filePath = this.pathFor(runId);
    let raw: unknown;
    try {
      raw = await readJsonIfExists(filePath);
    } catch (err) {
      throw new CheckpointStorageError(runId, `Checkpoint for ${runId} is unreadable: ${toErrorMessage(err)}`, err);
    }
    if (raw === undefined) return undefined;

    if (!isRecord(raw) || raw.run_id !== runId || !isStringArray(raw.processed_ids)) {
      throw new CheckpointStorageError(runId, `Checkpoint for ${runId} is corrupt`);
    }
    return { run_id: runId, processed_ids: raw.processed_ids };
  }
}
