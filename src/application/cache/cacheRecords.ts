import { createWorkItem, type WorkItem } from "../../core/items/workItem";
import type { CacheDecoder } from "../../ports/CacheBackend";
import type { BackendKind } from "../../ports/ConversionBackend";
import type { TokenUsage } from "../../ports/SummarizationProvider";
import { isRecord, optionalFiniteNumber, optionalString } from "../../shared/validation/guards";

export type DownloadArtifact = { kind: "download"; path: string };

export type ConversionArtifact = {
  kind: "conversion";
  backend: string;
  backendKind: BackendKind | "none";
  text: string;
  qualityScore: number;
  pageCount?: number;
};

export type ArtifactRecord = DownloadArtifact | ConversionArtifact;

export type ResultRecord = {
  status: "completed" | "degraded";
  provider: string;
  backend: string;
  contentSource: "document" | "abstract";
  qualityScore: number;
  result: Record<string, unknown>;
  usage: TokenUsage;
  costUsd: number;
  usedFallback: boolean;
};

const backendKinds: ReadonlyArray<BackendKind | "none"> = ["pdf", "html", "plain_text", "custom", "none"];

const decodeBackendKind = (value: unknown): BackendKind | "none" | undefined =>
  backendKinds.find((kind) => kind === value);

export const decodeArtifactRecord: CacheDecoder<ArtifactRecord> = (value) => {
  if (!isRecord(value)) return undefined;

  if (value.kind === "download") {
    const path = optionalString(value.path);
    return path === undefined ? undefined : { kind: "download", path };
  }

  if (value.kind === "conversion") {
    const backend = optionalString(value.backend);
    const backendKind = decodeBackendKind(value.backendKind);
    const text = optionalString(value.text);
    const qualityScore = optionalFiniteNumber(value.qualityScore);
    if (backend === undefined || backendKind === undefined || text === undefined || qualityScore === undefined) {
      return undefined;
    }
    return { kind: "conversion", backend, backendKind, text, qualityScore, pageCount: optionalFiniteNumber(value.pageCount) };
  }

  return undefined;
};

export const decodeResultRecord: CacheDecoder<ResultRecord> = (value) => {
  if (!isRecord(value) || !isRecord(value.result) || !isRecord(value.usage)) return undefined;

  const status = value.status === "completed" || value.status === "degraded" ? value.status : undefined;
  const contentSource =
    value.contentSource === "document" || value.contentSource === "abstract" ? value.contentSource : undefined;
  const provider = optionalString(value.provider);
  const backend = optionalString(value.backend);
  const qualityScore = optionalFiniteNumber(value.qualityScore);
  const costUsd = optionalFiniteNumber(value.costUsd);
  const inputTokens = optionalFiniteNumber(value.usage.inputTokens);
  const outputTokens = optionalFiniteNumber(value.usage.outputTokens);

  if (
    status === undefined ||
    contentSource === undefined ||
    provider === undefined ||
    backend === undefined ||
    qualityScore === undefined ||
    costUsd === undefined ||
    inputTokens === undefined ||
    outputTokens === undefined ||
    typeof value.usedFallback !== "boolean"
  ) {
    return undefined;
  }

  return {
    status,
    provider,
    backend,
    contentSource,
    qualityScore,
    result: value.result,
    usage: { inputTokens, outputTokens },
    costUsd,
    usedFallback: value.usedFallback
  };
};

const decodeWorkItem = (value: unknown): WorkItem | undefined => {
  if (!isRecord(value)) return undefined;
  const id = optionalString(value.id);
  const title = optionalString(value.title);
  const sourceLocation = optionalString(value.sourceLocation);
  if (id === undefined || title === undefined || sourceLocation === undefined) return undefined;

  try {
    return createWorkItem({
      id,
      title,
      sourceLocation,
      externalId: optionalString(value.externalId),
      abstract: optionalString(value.abstract),
      popularity: optionalFiniteNumber(value.popularity),
      publishedYear: optionalFiniteNumber(value.publishedYear),
      metadata: isRecord(value.metadata) ? value.metadata : undefined
    });
  } catch {
    return undefined;
  }
};

export const decodeWorkItems: CacheDecoder<WorkItem[]> = (value) => {
  if (!Array.isArray(value)) return undefined;
  const items: WorkItem[] = [];
  for (const member of value) {
    const item = decodeWorkItem(member);
    if (!item) return undefined;
    items.push(item);
  }
  return items;
};
