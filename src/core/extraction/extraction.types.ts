import type { BackendKind } from "../../ports/ConversionBackend";

/** Outcome of one backend try. Never mutated after creation. */
export type ExtractionAttempt = {
  readonly backend: string;
  readonly backendKind: BackendKind | "none";
  readonly success: boolean;
  readonly text: string | null;
  readonly qualityScore: number; // 0.0..1.0
  readonly durationMs: number;
  readonly error: string | null;
  readonly pageCount?: number;
};

export const NO_BACKEND = "none";

export const failedAttempt = (error: string, durationMs = 0): ExtractionAttempt =>
  Object.freeze({
    backend: NO_BACKEND,
    backendKind: "none",
    success: false,
    text: null,
    qualityScore: 0,
    durationMs,
    error
  });
