export type BackendKind = "pdf" | "html" | "plain_text" | "custom";

export type ConversionOutput = {
  text: string;
  pageCount?: number;
};

/**
 * A document-to-text converter. Failures are reported by throwing; the
 * fallback chain classifies them and moves on.
 */
export interface ConversionBackend {
  readonly name: string;
  readonly kind: BackendKind;
  /** Cheap synchronous check for a missing dependency. Consulted once, at chain construction. */
  isAvailable(): boolean;
  convert(sourceLocation: string, signal?: AbortSignal): Promise<ConversionOutput>;
}
