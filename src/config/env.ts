import dotenv from "dotenv";
import { ComponentWeights } from "../shared/types/matching.types";
import { LogLevel } from "./logger";

dotenv.config();

export const DEFAULT_COMPONENT_WEIGHTS: ComponentWeights = Object.freeze({
  skills: 0.3,
  experience: 0.3,
  education: 0.3,
  recruiterPreferences: 0.1,
});

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  openaiApiKey: string;
  openaiChatModel: string;
  openaiEmbeddingModel: string;
  embeddingTimeoutMs: number;
  embeddingCacheSize: number;
  rankingConcurrency: number;
  rankingTimeoutMs: number;
  killerSoftMatchThreshold?: number;
  defaultWeights: ComponentWeights;
}

function getRequiredString(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

function getOptionalTrimmed(name: string): string | undefined {
  const value = process.env[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(): EnvConfig {
  const portRaw = process.env.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevelRaw = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  const embeddingTimeoutRaw = process.env.EMBEDDING_TIMEOUT_MS ?? "15000";
  const embeddingTimeoutMs = Number(embeddingTimeoutRaw);
  const embeddingCacheSizeRaw = process.env.EMBEDDING_CACHE_SIZE ?? "2000";
  const embeddingCacheSize = Number(embeddingCacheSizeRaw);
  const rankingConcurrencyRaw = process.env.RANKING_CONCURRENCY ?? "4";
  const rankingConcurrency = Number(rankingConcurrencyRaw);
  const rankingTimeoutRaw = process.env.RANKING_TIMEOUT_MS ?? "120000";
  const rankingTimeoutMs = Number(rankingTimeoutRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(embeddingTimeoutMs) || embeddingTimeoutMs < 1000) {
    throw new Error(`Invalid EMBEDDING_TIMEOUT_MS value: ${embeddingTimeoutRaw}`);
  }
  if (!Number.isInteger(embeddingCacheSize) || embeddingCacheSize < 0) {
    throw new Error(`Invalid EMBEDDING_CACHE_SIZE value: ${embeddingCacheSizeRaw}`);
  }
  if (!Number.isInteger(rankingConcurrency) || rankingConcurrency < 1) {
    throw new Error(`Invalid RANKING_CONCURRENCY value: ${rankingConcurrencyRaw}`);
  }
  if (!Number.isInteger(rankingTimeoutMs) || rankingTimeoutMs < 1000) {
    throw new Error(`Invalid RANKING_TIMEOUT_MS value: ${rankingTimeoutRaw}`);
  }

  return {
    nodeEnv: process.env.NODE_ENV ?? "development",
    port,
    logLevel: parseLogLevel(logLevelRaw),
    openaiApiKey: getRequiredString("OPENAI_API_KEY"),
    openaiChatModel: getOptionalTrimmed("OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    openaiEmbeddingModel:
      getOptionalTrimmed("OPENAI_EMBEDDINGS_MODEL") ??
      getOptionalTrimmed("OPENAI_EMBEDDING_MODEL") ??
      "text-embedding-3-small",
    embeddingTimeoutMs,
    embeddingCacheSize,
    rankingConcurrency,
    rankingTimeoutMs,
    killerSoftMatchThreshold: parseSoftMatchThreshold(process.env.KILLER_SOFT_MATCH_THRESHOLD ?? "0.85"),
    defaultWeights: parseWeights(getOptionalTrimmed("DEFAULT_WEIGHTS")),
  };
}

export function parseSoftMatchThreshold(value: string): number | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "off" || normalized === "false" || normalized === "none" || normalized === "") {
    return undefined;
  }
  const threshold = Number(normalized);
  if (!Number.isFinite(threshold) || threshold <= 0 || threshold > 1) {
    throw new Error(
      `Invalid KILLER_SOFT_MATCH_THRESHOLD value: ${value}. Expected number in (0, 1] or "off".`,
    );
  }
  return threshold;
}

/**
 * Parses `skills=0.4,experience=0.3,education=0.2,recruiterPreferences=0.1`.
 * Components left out keep their default weight.
 */
export function parseWeights(rawValue: string | undefined): ComponentWeights {
  if (!rawValue) {
    return DEFAULT_COMPONENT_WEIGHTS;
  }

  const weights: ComponentWeights = { ...DEFAULT_COMPONENT_WEIGHTS };
  for (const pair of rawValue.split(",")) {
    const [rawKey, rawWeight] = pair.split("=").map((item) => item.trim());
    if (!rawKey) {
      continue;
    }
    const weight = Number(rawWeight);
    if (!Number.isFinite(weight) || weight < 0) {
      throw new Error(`Invalid DEFAULT_WEIGHTS entry: ${pair}`);
    }
    const key = parseWeightKey(rawKey);
    weights[key] = weight;
  }
  return Object.freeze(weights);
}

function parseWeightKey(value: string): keyof ComponentWeights {
  const normalized = value.toLowerCase().replace(/[_\s-]/g, "");
  if (normalized === "skills") {
    return "skills";
  }
  if (normalized === "experience") {
    return "experience";
  }
  if (normalized === "education") {
    return "education";
  }
  if (normalized === "recruiterpreferences" || normalized === "preferences") {
    return "recruiterPreferences";
  }
  throw new Error(`Invalid DEFAULT_WEIGHTS component: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
