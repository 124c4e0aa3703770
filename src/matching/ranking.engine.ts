import { Logger } from "../config/logger";
import { validateJobProfile } from "../profiles/profile.schemas";
import { ValidationError, errorMessage } from "../shared/errors";
import {
  CandidateFailure,
  ComponentWeights,
  MatchScore,
  RankedCandidate,
  RankingInput,
  RankingOptions,
  RankingResult,
} from "../shared/types/matching.types";
import { PoolOutcome, runBounded } from "../shared/utils/bounded-pool";
import { MatchScorer, validateWeights } from "./scoring/match-scorer";

type SlotOutcome =
  | { status: "scored"; score: MatchScore }
  | { status: "failed"; failure: CandidateFailure };

export class RankingEngine {
  constructor(
    private readonly matchScorer: MatchScorer,
    private readonly logger: Logger,
    private readonly defaults: {
      weights: ComponentWeights;
      concurrency?: number;
    },
  ) {}

  async rank(input: RankingInput, options?: RankingOptions): Promise<RankingResult> {
    const weights = input.weights ?? this.defaults.weights;
    validateJobProfile(input.job);
    validateWeights(weights);

    const startedAt = Date.now();

    const slots = await runBounded(
      input.candidates.length,
      (index, signal) => this.scoreSlot(input, weights, index, signal),
      {
        concurrency: options?.concurrency ?? this.defaults.concurrency,
        signal: options?.signal,
        timeoutMs: options?.timeoutMs,
      },
    );

    const result = mergeSlots(input, slots);
    this.logger.info("Ranking completed", {
      job: input.job.title,
      candidates: input.candidates.length,
      ranked: result.ranking.length,
      failed: result.failures.length,
      cancelled: result.cancelled.length,
      complete: result.complete,
      latencyMs: Date.now() - startedAt,
    });
    return result;
  }

  private async scoreSlot(
    input: RankingInput,
    weights: ComponentWeights,
    index: number,
    signal: AbortSignal,
  ): Promise<SlotOutcome> {
    const candidate = input.candidates[index];
    try {
      const score = await this.matchScorer.score({
        job: input.job,
        candidate,
        weights,
        killerCriteria: input.killerCriteria,
        recruiterPreferences: input.recruiterPreferences,
        signal,
      });
      return { status: "scored", score };
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      const candidateName = error.candidateName ?? readCandidateName(candidate);
      this.logger.warn("Candidate skipped: invalid profile", {
        candidateIndex: index,
        candidateName,
        field: error.field,
        error: errorMessage(error),
      });
      return {
        status: "failed",
        failure: {
          inputIndex: index,
          candidateName,
          kind: error.kind,
          field: error.field,
          message: error.message,
        },
      };
    }
  }
}

function mergeSlots(input: RankingInput, slots: ReadonlyArray<PoolOutcome<SlotOutcome>>): RankingResult {
  const ranking: RankedCandidate[] = [];
  const failures: CandidateFailure[] = [];
  const cancelled: number[] = [];

  slots.forEach((slot, index) => {
    if (slot.status === "cancelled") {
      cancelled.push(index);
      return;
    }
    const outcome = slot.value;
    if (outcome.status === "failed") {
      failures.push(outcome.failure);
      return;
    }
    ranking.push({ inputIndex: index, candidate: input.candidates[index], score: outcome.score });
  });

  return {
    ranking: sortRanking(ranking),
    failures,
    cancelled,
    complete: cancelled.length === 0,
  };
}

/**
 * Qualified candidates first, then disqualified ones; each group by final
 * score descending, ties in input order.
 */
export function sortRanking(entries: ReadonlyArray<RankedCandidate>): RankedCandidate[] {
  return [...entries].sort((left, right) => {
    if (left.score.disqualified !== right.score.disqualified) {
      return left.score.disqualified ? 1 : -1;
    }
    if (right.score.finalScore !== left.score.finalScore) {
      return right.score.finalScore - left.score.finalScore;
    }
    return left.inputIndex - right.inputIndex;
  });
}

function readCandidateName(candidate: unknown): string {
  if (typeof candidate === "object" && candidate !== null && "name" in candidate) {
    const name = candidate.name;
    if (typeof name === "string" && name.trim()) {
      return name.trim();
    }
  }
  return "unknown";
}
