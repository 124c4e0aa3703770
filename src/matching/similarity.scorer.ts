import { EmbeddingProvider } from "../ai/embeddings.client";
import { Logger } from "../config/logger";
import { EmbeddingProviderError, errorMessage } from "../shared/errors";
import { SimilarityResult } from "../shared/types/matching.types";

export class SimilarityScorer {
  constructor(
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly logger: Logger,
  ) {}

  async similarity(textA: string, textB: string, signal?: AbortSignal): Promise<number> {
    const result = await this.compare(textA, textB, signal);
    return result.score;
  }

  /** Rejects instead of degrading once `signal` has fired. */
  async compare(textA: string, textB: string, signal?: AbortSignal): Promise<SimilarityResult> {
    if (!textA.trim() || !textB.trim()) {
      return { score: tokenOverlap(textA, textB), method: "token_overlap" };
    }

    try {
      const [vectorA, vectorB] = await Promise.all([
        this.embeddingProvider.embed(textA, signal),
        this.embeddingProvider.embed(textB, signal),
      ]);
      return { score: clampUnit(cosineSimilarity(vectorA, vectorB)), method: "embedding" };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const degradedKind = error instanceof EmbeddingProviderError ? error.kind : "ProviderUnavailable";
      this.logger.warn("ProviderDegraded: embedding failed, using token overlap", {
        kind: degradedKind,
        error: errorMessage(error),
      });
      return { score: tokenOverlap(textA, textB), method: "token_overlap", degradedKind };
    }
  }
}

export function cosineSimilarity(a: ReadonlyArray<number>, b: ReadonlyArray<number>): number {
  const size = Math.min(a.length, b.length);
  if (size === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let index = 0; index < size; index += 1) {
    dot += a[index] * b[index];
    normA += a[index] * a[index];
    normB += b[index] * b[index];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** |A ∩ B| / max(1, |A ∪ B|) over lowercase tokens. */
export function tokenOverlap(textA: string, textB: string): number {
  const left = tokenize(textA);
  const right = tokenize(textB);
  let intersection = 0;
  for (const token of left) {
    if (right.has(token)) {
      intersection += 1;
    }
  }
  const union = left.size + right.size - intersection;
  return intersection / Math.max(1, union);
}

export function tokenize(text: string): Set<string> {
  return new Set(tokenList(text));
}

export function tokenList(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}+#.]/gu, " ")
    .split(/\s+/)
    .map((token) => token.replace(/^\.+|\.+$/g, ""))
    .filter((token) => token.length > 0);
}

export function clampUnit(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    return 0;
  }
  if (value > 1) {
    return 1;
  }
  return value;
}
