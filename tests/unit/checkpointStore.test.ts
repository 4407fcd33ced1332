import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { FileCheckpointStore } from "../../src/infrastructure/fs/FileCheckpointStore";
import { CheckpointStorageError } from "../../src/shared/errors/pipeline.errors";

describe("FileCheckpointStore", () => {
  let dir: string;
  let store: FileCheckpointStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "checkpoints-"));
    store = new FileCheckpointStore(dir);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes the run_id / processed_ids file format", async () => {
    await store.recordCompletedMany("run-1", ["a", "b"]);

    await expect(fs.readFile(path.join(dir, "run-1.json"), "utf-8")).resolves.toBe(
      '{\n  "run_id": "run-1",\n  "processed_ids": [\n    "a",\n    "b"\n  ]\n}\n'
    );
  });

  it("loads completed ids and ignores repeats", async () => {
    await store.recordCompleted("run-1", "a");
    await store.recordCompletedMany("run-1", ["a", "b", "b"]);

    await expect(store.loadCompleted("run-1")).resolves.toEqual(new Set(["a", "b"]));
  });

  it("serializes concurrent writes without losing ids", async () => {
    const ids = Array.from({ length: 20 }, (_, i) => `item-${i}`);

    await Promise.all(ids.map((id) => store.recordCompleted("run-1", id)));

    const completed = await store.loadCompleted("run-1");
    expect(completed.size).toBe(20);
  });

  it("returns an empty set for an unknown run and after clear", async () => {
    await expect(store.loadCompleted("run-1")).resolves.toEqual(new Set());

    await store.recordCompleted("run-1", "a");
    await store.clear("run-1");

    await expect(store.loadCompleted("run-1")).resolves.toEqual(new Set());
  });

  it("lists runs with a checkpoint", async () => {
    await store.recordCompleted("run-b", "x");
    await store.recordCompleted("run-a", "y");

    await expect(store.listRuns()).resolves.toEqual(["run-a", "run-b"]);
    await expect(new FileCheckpointStore(path.join(dir, "missing")).listRuns()).resolves.toEqual([]);
  });

  it("raises CheckpointStorageError for an unreadable file", async () => {
    await fs.writeFile(path.join(dir, "run-1.json"), "not json");

    const load = store.loadCompleted("run-1");

    await expect(load).rejects.toBeInstanceOf(CheckpointStorageError);
    await expect(load).rejects.toThrow("Checkpoint for run-1 is unreadable");
  });

  it("raises CheckpointStorageError for a file of another run or shape", async () => {
    await fs.writeFile(path.join(dir, "run-1.json"), JSON.stringify({ run_id: "run-2", processed_ids: [] }));
    await expect(store.loadCompleted("run-1")).rejects.toThrow("Checkpoint for run-1 is corrupt");

    await fs.writeFile(path.join(dir, "run-1.json"), JSON.stringify({ run_id: "run-1", processed_ids: [1, 2] }));
    await expect(store.loadCompleted("run-1")).rejects.toThrow("Checkpoint for run-1 is corrupt");
  });

  it("rejects run ids that are not safe file names", async () => {
    await expect(store.loadCompleted("../escape")).rejects.toThrow("Invalid run id: ../escape");
  });
});
