import fetch from "node-fetch";
import { Logger, logContext } from "../config/logger";
import { SCREENING_SYSTEM_PROMPT } from "./system/screening.system";

export const CHAT_MODEL = process.env.OPENAI_CHAT_MODEL || "gpt-4o-mini";

const CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";
const EXTRACTION_TEMPERATURE = 0.1;

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  response_format: {
    type: "json_object";
  };
  max_tokens?: number;
  max_completion_tokens?: number;
}

interface LlmCallOptions {
  promptName?: string;
}

/** The slice of the chat client the standardizer depends on; tests pass plain objects. */
export interface StructuredJsonClient {
  generateStructuredJson(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string>;
  getModelName?(): string;
}

export class LlmClient implements StructuredJsonClient {
  private readonly chatModel: string;

  constructor(
    private readonly apiKey: string,
    private readonly logger: Logger,
    modelOverride?: string,
  ) {
    this.chatModel = modelOverride || CHAT_MODEL;
  }

  getModelName(): string {
    return this.chatModel;
  }

  async generateStructuredJson(
    prompt: string,
    maxTokens: number,
    options?: LlmCallOptions,
  ): Promise<string> {
    const promptName = options?.promptName ?? "structured_json";
    const startedAt = Date.now();

    try {
      const content = await this.requestCompletion(this.buildJsonRequestBody(prompt, maxTokens));
      logContext(
        this.logger,
        "info",
        "llm.call.completed",
        { prompt_name: promptName, model_name: this.chatModel, latency_ms: Date.now() - startedAt, ok: true },
        { maxTokens, promptChars: prompt.length, outputChars: content.length },
      );
      return content;
    } catch (error) {
      logContext(
        this.logger,
        "warn",
        "llm.call.failed",
        { prompt_name: promptName, model_name: this.chatModel, latency_ms: Date.now() - startedAt, ok: false },
        { maxTokens, error: error instanceof Error ? error.message : "Unknown error" },
      );
      throw error;
    }
  }

  buildJsonRequestBody(prompt: string, maxTokens: number): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.chatModel,
      temperature: EXTRACTION_TEMPERATURE,
      messages: [
        { role: "system", content: SCREENING_SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      response_format: { type: "json_object" },
    };
    if (usesMaxCompletionTokens(this.chatModel)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }

  private async requestCompletion(requestBody: ChatCompletionsRequestBody): Promise<string> {
    const response = await fetch(CHAT_COMPLETIONS_URL, {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify(requestBody),
    });

    // The status stays in the message: llm.safe decides on retries from it.
    if (!response.ok) {
      throw new Error(`OpenAI API error: HTTP ${response.status} - ${await response.text()}`);
    }

    const content = readMessageContent(await response.json());
    if (!content) {
      throw new Error("OpenAI response does not contain message content");
    }
    return content;
  }
}

function readMessageContent(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("choices" in body) || !Array.isArray(body.choices)) {
    return null;
  }
  const [choice]: unknown[] = body.choices;
  if (typeof choice !== "object" || choice === null || !("message" in choice)) {
    return null;
  }
  const message: unknown = choice.message;
  if (typeof message !== "object" || message === null || !("content" in message)) {
    return null;
  }
  return typeof message.content === "string" && message.content.trim() ? message.content : null;
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || /^o\d/.test(normalized);
}
