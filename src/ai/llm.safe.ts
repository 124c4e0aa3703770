import { Logger } from "../config/logger";
import { StructuredJsonClient } from "./llm.client";
import { buildJsonRepairV1Prompt } from "./prompts/utils/json-repair.v1.prompt";

export interface JsonSafeCallArgs {
  llmClient: StructuredJsonClient;
  prompt: string;
  maxTokens: number;
  promptName: string;
  schemaHint: string;
  logger?: Logger;
  timeoutMs?: number;
}

export type SafeJsonErrorCode = "timeout" | "transient_failure" | "llm_failure" | "json_parse_failed";

export type SafeJsonResult =
  | { ok: true; data: Record<string, unknown> }
  | { ok: false; error_code: SafeJsonErrorCode; raw?: string };

type CallOutcome =
  | { ok: true; raw: string }
  | { ok: false; error_code: Exclude<SafeJsonErrorCode, "json_parse_failed"> };

const DEFAULT_TIMEOUT_MS = 25_000;
const REPAIR_MIN_TOKENS = 240;
const REPAIR_MAX_TOKENS = 2400;
const TRANSIENT_MARKERS = [
  "timeout",
  "econnreset",
  "network",
  "429",
  "rate limit",
  "http 500",
  "http 502",
  "http 503",
  "http 504",
];

/**
 * Runs a JSON prompt and never throws: a transient failure is retried once,
 * unparseable output gets one repair pass, anything else becomes an error code.
 */
export async function callJsonPromptSafe(args: JsonSafeCallArgs): Promise<SafeJsonResult> {
  const timeoutMs = args.timeoutMs && args.timeoutMs > 0 ? Math.round(args.timeoutMs) : DEFAULT_TIMEOUT_MS;

  const first = await callWithRetry(args, args.prompt, args.maxTokens, args.promptName, timeoutMs);
  if (!first.ok) {
    return first;
  }
  const parsed = tryParseJsonObject(first.raw);
  if (parsed.ok) {
    return parsed;
  }

  args.logger?.warn("llm.safe.json_repair", { promptName: args.promptName });
  const repaired = await callWithRetry(
    args,
    buildJsonRepairV1Prompt({ schemaHint: args.schemaHint, raw: first.raw }),
    Math.min(REPAIR_MAX_TOKENS, Math.max(REPAIR_MIN_TOKENS, args.maxTokens)),
    `${args.promptName}_json_repair`,
    timeoutMs,
  );
  if (!repaired.ok) {
    return repaired;
  }
  const reparsed = tryParseJsonObject(repaired.raw);
  return reparsed.ok ? reparsed : { ok: false, error_code: "json_parse_failed", raw: repaired.raw };
}

async function callWithRetry(
  args: JsonSafeCallArgs,
  prompt: string,
  maxTokens: number,
  promptName: string,
  timeoutMs: number,
): Promise<CallOutcome> {
  const call = (): Promise<string> =>
    withTimeout(args.llmClient.generateStructuredJson(prompt, maxTokens, { promptName }), timeoutMs);

  try {
    return { ok: true, raw: await call() };
  } catch (error) {
    if (!isTransient(error)) {
      return { ok: false, error_code: isTimeout(error) ? "timeout" : "llm_failure" };
    }
  }

  args.logger?.warn("llm.safe.retry.once", {
    promptName,
    modelName: args.llmClient.getModelName?.(),
  });
  try {
    return { ok: true, raw: await call() };
  } catch (error) {
    if (isTimeout(error)) {
      return { ok: false, error_code: "timeout" };
    }
    return { ok: false, error_code: isTransient(error) ? "transient_failure" : "llm_failure" };
  }
}

/** Takes the outermost `{...}` span, so fenced or prefixed replies still parse. */
export function tryParseJsonObject(
  raw: string,
): { ok: true; data: Record<string, unknown> } | { ok: false } {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start < 0 || end <= start) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(raw.slice(start, end + 1));
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return { ok: false };
    }
    return { ok: true, data: { ...parsed } };
  } catch {
    return { ok: false };
  }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error("timeout")), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function lowerMessage(error: unknown): string {
  return error instanceof Error ? error.message.toLowerCase() : "";
}

function isTimeout(error: unknown): boolean {
  return lowerMessage(error).includes("timeout");
}

function isTransient(error: unknown): boolean {
  const message = lowerMessage(error);
  return TRANSIENT_MARKERS.some((marker) => message.includes(marker));
}
