export type SummaryTarget = {
  name: string;
  instructions: string;
  fields?: string[];
};

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
};

export type ProviderPricing = {
  inputPer1k: number;
  outputPer1k: number;
};

export type SummarizationResponse = {
  result: Record<string, unknown>;
  usage: TokenUsage;
};

/**
 * External summarization model. Implementations signal failures with the typed
 * errors from shared/errors (TransientProviderError, RateLimitedError,
 * QuotaExhaustedError, PermanentProviderError).
 */
export interface SummarizationProvider {
  readonly name: string;
  readonly pricing?: ProviderPricing;
  summarize(text: string, target: SummaryTarget, signal?: AbortSignal): Promise<SummarizationResponse>;
}
