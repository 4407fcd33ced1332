import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { defaultPipelineConfig } from "../../src/application/pipeline/pipeline.config";
import type { SummarizationProvider } from "../../src/ports/SummarizationProvider";

const stubProvider = (name: string): SummarizationProvider => ({
  name,
  summarize: async () => ({ result: { summary: `from ${name}` }, usage: { inputTokens: 1, outputTokens: 1 } })
});

describe("composition root", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "composition-"));
  });

  afterEach(async () => {
    jest.resetModules();
    jest.restoreAllMocks();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("wires a file-backed pipeline when MONGO_URI is not set", async () => {
    const mongoCtor = jest.fn();
    jest.doMock("../../src/infrastructure/mongo/MongoDedupHistoryRepository", () => ({
      MongoDedupHistoryRepository: mongoCtor
    }));

    const { buildPipeline } = await import("../../src/composition/root");
    const handle = await buildPipeline({ env: { DATA_DIR: dataDir, LOG_LEVEL: "silent" } });

    expect(handle.config).toEqual(defaultPipelineConfig);
    expect(handle.providerClient.providerNames()).toEqual(["primary"]);
    expect(mongoCtor).not.toHaveBeenCalled();
    await expect(handle.close()).resolves.toBeUndefined();
  });

  it("uses the Mongo dedup history when MONGO_URI is set and closes it", async () => {
    const close = jest.fn().mockResolvedValue(undefined);
    const repo = { loadAll: jest.fn().mockResolvedValue([]), append: jest.fn(), close };
    const mongoCtor = jest.fn().mockImplementation(() => repo);
    jest.doMock("../../src/infrastructure/mongo/MongoDedupHistoryRepository", () => ({
      MongoDedupHistoryRepository: mongoCtor
    }));

    const { buildPipeline } = await import("../../src/composition/root");
    const handle = await buildPipeline({
      env: { DATA_DIR: dataDir, LOG_LEVEL: "silent", MONGO_URI: "mongodb://localhost:27017/pipeline" }
    });
    await handle.close();

    expect(mongoCtor).toHaveBeenCalledWith("mongodb://localhost:27017/pipeline");
    expect(repo.loadAll).toHaveBeenCalledTimes(1);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("closes the Mongo client when loading the dedup history fails", async () => {
    const close = jest.fn().mockResolvedValue(undefined);
    const repo = { loadAll: jest.fn().mockRejectedValue(new Error("connection refused")), append: jest.fn(), close };
    jest.doMock("../../src/infrastructure/mongo/MongoDedupHistoryRepository", () => ({
      MongoDedupHistoryRepository: jest.fn().mockImplementation(() => repo)
    }));

    const { buildPipeline } = await import("../../src/composition/root");

    await expect(
      buildPipeline({ env: { DATA_DIR: dataDir, LOG_LEVEL: "silent", MONGO_URI: "mongodb://localhost:27017/pipeline" } })
    ).rejects.toThrow("connection refused");
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("requires a fallback URL when the fallback provider is enabled", async () => {
    const { buildPipeline } = await import("../../src/composition/root");

    await expect(
      buildPipeline({ env: { DATA_DIR: dataDir, LOG_LEVEL: "silent", PIPELINE_FALLBACK_ENABLED: "true" } })
    ).rejects.toThrow("FALLBACK_SUMMARIZER_URL is required when the fallback provider is enabled");

    const handle = await buildPipeline({
      env: {
        DATA_DIR: dataDir,
        LOG_LEVEL: "silent",
        PIPELINE_FALLBACK_ENABLED: "true",
        FALLBACK_SUMMARIZER_URL: "http://127.0.0.1:9000"
      }
    });
    expect(handle.providerClient.providerNames()).toEqual(["primary", "fallback"]);
  });

  it("prefers explicit config and providers over env", async () => {
    const { buildPipeline } = await import("../../src/composition/root");

    const handle = await buildPipeline({
      env: { DATA_DIR: dataDir, LOG_LEVEL: "silent", PIPELINE_MAX_CONCURRENT_DOWNLOADS: "9" },
      config: { maxConcurrentDownloads: 2, fallbackProvider: { enabled: true } },
      primaryProvider: stubProvider("model-a"),
      fallbackProvider: stubProvider("model-b")
    });

    expect(handle.config.maxConcurrentDownloads).toBe(2);
    expect(handle.providerClient.providerNames()).toEqual(["model-a", "model-b"]);
  });

  it("ignores pipeline variables from env when a config is passed in", async () => {
    const { buildPipeline } = await import("../../src/composition/root");

    const handle = await buildPipeline({
      env: { DATA_DIR: dataDir, LOG_LEVEL: "silent", PIPELINE_MAX_CONCURRENT_DOWNLOADS: "999", RETRY_MAX_ATTEMPTS: "abc" },
      config: { maxConcurrentDownloads: 4 }
    });

    expect(handle.config).toEqual({ ...defaultPipelineConfig, maxConcurrentDownloads: 4 });
  });

  it("fails fast when runtime caps are violated", async () => {
    const { buildPipeline } = await import("../../src/composition/root");

    await expect(
      buildPipeline({ env: { DATA_DIR: dataDir, PIPELINE_MAX_CONCURRENT_DOWNLOADS: "999" } })
    ).rejects.toThrow("PIPELINE_MAX_CONCURRENT_DOWNLOADS=999 is out of allowed range [1..50]");
  });
});
