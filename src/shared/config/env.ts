import path from "path";
import { parseLogLevel, type LogThreshold } from "../logging/logger";

export type Env = {
  DATA_DIR: string;
  MONGO_URI?: string;
  SUMMARIZER_URL: string;
  SUMMARIZER_API_KEY: string;
  FALLBACK_SUMMARIZER_URL?: string;
  FALLBACK_SUMMARIZER_API_KEY: string;
  LOG_LEVEL: LogThreshold;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const DATA_DIR = path.resolve(nonEmpty(env.DATA_DIR) ?? "data");
  const MONGO_URI = nonEmpty(env.MONGO_URI);
  const SUMMARIZER_URL = validateHttpUrl("SUMMARIZER_URL", nonEmpty(env.SUMMARIZER_URL) ?? "http://localhost:8080");
  const SUMMARIZER_API_KEY = env.SUMMARIZER_API_KEY ?? "";
  const fallbackUrl = nonEmpty(env.FALLBACK_SUMMARIZER_URL);
  const FALLBACK_SUMMARIZER_URL = fallbackUrl ? validateHttpUrl("FALLBACK_SUMMARIZER_URL", fallbackUrl) : undefined;
  const FALLBACK_SUMMARIZER_API_KEY = env.FALLBACK_SUMMARIZER_API_KEY ?? "";
  const LOG_LEVEL = parseLogLevel(env.LOG_LEVEL, "info");

  return {
    DATA_DIR,
    MONGO_URI,
    SUMMARIZER_URL,
    SUMMARIZER_API_KEY,
    FALLBACK_SUMMARIZER_URL,
    FALLBACK_SUMMARIZER_API_KEY,
    LOG_LEVEL
  };
};
