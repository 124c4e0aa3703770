import fetch, { Response } from "node-fetch";
import { EmbeddingProviderError } from "../shared/errors";

const MAX_INPUT_CHARS = 6000;
const DEFAULT_TIMEOUT_MS = 15_000;

export interface EmbeddingProvider {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

interface EmbeddingsResponse {
  data: Array<{
    embedding: number[];
  }>;
}

export class EmbeddingsClient implements EmbeddingProvider {
  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
  ) {}

  getModelName(): string {
    return this.model;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    let response: Response;
    try {
      response = await fetch("https://api.openai.com/v1/embeddings", {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify({
          model: this.model,
          input: text.slice(0, MAX_INPUT_CHARS),
        }),
        timeout: this.timeoutMs,
        signal,
      });
    } catch (error) {
      throw new EmbeddingProviderError(
        "ProviderUnavailable",
        `Embeddings API request failed: ${error instanceof Error ? error.message : "Unknown error"}`,
      );
    }

    if (!response.ok) {
      const body = await response.text();
      throw new EmbeddingProviderError(
        response.status === 429 ? "RateLimited" : "ProviderUnavailable",
        `Embeddings API error: HTTP ${response.status} - ${body.slice(0, 300)}`,
        response.status,
      );
    }

    const body = (await response.json()) as EmbeddingsResponse;
    const vector = body.data[0]?.embedding;
    if (!Array.isArray(vector) || vector.length === 0) {
      throw new EmbeddingProviderError("ProviderUnavailable", "Embeddings API returned empty vector.");
    }

    return vector;
  }
}
