import type {
  ProviderPricing,
  SummarizationProvider,
  SummarizationResponse,
  SummaryTarget
} from "../../ports/SummarizationProvider";
import {
  PermanentProviderError,
  QuotaExhaustedError,
  RateLimitedError,
  TransientProviderError,
  toErrorMessage
} from "../../shared/errors/pipeline.errors";
import { isRecord, optionalFiniteNumber } from "../../shared/validation/guards";

export type HttpSummarizationProviderOptions = {
  name: string;
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  pricing?: ProviderPricing;
};

const parseRetryAfterMs = (header: string | null): number | undefined => {
  if (!header) return undefined;
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  return undefined;
};

const readErrorCode = (body: unknown): string | undefined => {
  if (!isRecord(body)) return undefined;
  if (typeof body.code === "string") return body.code;
  if (isRecord(body.error) && typeof body.error.code === "string") return body.error.code;
  return undefined;
};

const parseBody = (raw: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return undefined;
  }
};

/**
 * JSON-over-HTTP summarization endpoint: `POST <baseUrl>/summarize` with
 * `{ text, target }`, answering `{ result, usage: { inputTokens, outputTokens } }`.
 * Does not retry; HTTP failures are mapped onto the provider error types.
 */
export class HttpSummarizationProvider implements SummarizationProvider {
  readonly name: string;
  readonly pricing?: ProviderPricing;
  private readonly endpoint: URL;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(opts: HttpSummarizationProviderOptions) {
    this.name = opts.name;
    this.pricing = opts.pricing;
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs ?? 60000;
    this.endpoint = new URL(opts.baseUrl);
    this.endpoint.pathname = this.endpoint.pathname.endsWith("/")
      ? `${this.endpoint.pathname}summarize`
      : `${this.endpoint.pathname}/summarize`;
  }

  async summarize(text: string, target: SummaryTarget, signal?: AbortSignal): Promise<SummarizationResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    let res: Response;
    let raw: string;
    try {
      res = await fetch(this.endpoint.toString(), {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({ text, target }),
        signal: controller.signal
      });
      raw = await res.text();
    } catch (err) {
      if (controller.signal.aborted && !signal?.aborted) {
        throw new TransientProviderError(`${this.name} request timeout after ${this.timeoutMs}ms`, { cause: err });
      }
      if (signal?.aborted) throw err;
      throw new TransientProviderError(`${this.name} request failed: ${toErrorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }

    const body = parseBody(raw);
    if (!res.ok) throw this.toProviderError(res, body);
    return this.parseResponse(body);
  }

  private toProviderError(res: Response, body: unknown): Error {
    const message = `${this.name} request failed: ${res.status}`;
    if (res.status === 402 || readErrorCode(body) === "quota_exhausted") {
      return new QuotaExhaustedError(`${this.name} quota exhausted`);
    }
    if (res.status === 429) {
      return new RateLimitedError(message, parseRetryAfterMs(res.headers.get("retry-after")));
    }
    if (res.status >= 500) return new TransientProviderError(message, { status: res.status });
    return new PermanentProviderError(message, { status: res.status });
  }

  private parseResponse(body: unknown): SummarizationResponse {
    if (!isRecord(body) || !isRecord(body.result) || !isRecord(body.usage)) {
      throw new PermanentProviderError(`${this.name} returned a malformed response`);
    }
    const inputTokens = optionalFiniteNumber(body.usage.inputTokens);
    const outputTokens = optionalFiniteNumber(body.usage.outputTokens);
    if (inputTokens === undefined || outputTokens === undefined) {
      throw new PermanentProviderError(`${this.name} returned a malformed usage block`);
    }
    return { result: body.result, usage: { inputTokens, outputTokens } };
  }
}
