import { StructuredJsonClient } from "../ai/llm.client";
import { SafeJsonErrorCode, callJsonPromptSafe } from "../ai/llm.safe";
import {
  CANDIDATE_ANALYSIS_SCHEMA_HINT,
  buildCandidateAnalysisV1Prompt,
} from "../ai/prompts/analysis/candidate-analysis.v1.prompt";
import { Logger, logContext } from "../config/logger";
import { toStringArray, toText } from "../profiles/profile.schemas";
import { RankingOptions } from "../shared/types/matching.types";
import { CandidateProfile, JobProfile } from "../shared/types/profile.types";
import { runBounded } from "../shared/utils/bounded-pool";

const PROMPT_NAME = "candidate_analysis_v1";
const MAX_ITEMS = 5;

export type CandidateAnalysis =
  | {
      candidateName: string;
      ok: true;
      summary: string;
      strengths: string[];
      improvementAreas: string[];
    }
  | {
      candidateName: string;
      ok: false;
      errorCode: SafeJsonErrorCode | "empty_analysis";
    };

export interface CandidateAnalysisInput {
  candidates: ReadonlyArray<CandidateProfile>;
  job?: JobProfile | null;
}

export interface CandidateAnalysisResult {
  analyses: CandidateAnalysis[];
  /** Names of candidates whose analysis was cut off by the deadline. */
  cancelled: string[];
  complete: boolean;
}

/**
 * Writes a strengths / areas-to-improve review per selected candidate. A
 * candidate whose analysis fails gets an error entry; the others are kept.
 */
export class CandidateAnalysisService {
  constructor(
    private readonly llmClient: StructuredJsonClient,
    private readonly logger: Logger,
    private readonly defaults: { concurrency?: number } = {},
  ) {}

  async analyzeCandidates(input: CandidateAnalysisInput, options?: RankingOptions): Promise<CandidateAnalysisResult> {
    const slots = await runBounded(
      input.candidates.length,
      (index) => this.analyzeCandidate(input.candidates[index], input.job),
      {
        concurrency: options?.concurrency ?? this.defaults.concurrency,
        signal: options?.signal,
        timeoutMs: options?.timeoutMs,
      },
    );

    const analyses: CandidateAnalysis[] = [];
    const cancelled: string[] = [];
    slots.forEach((slot, index) => {
      if (slot.status === "cancelled") {
        cancelled.push(input.candidates[index].name);
      } else {
        analyses.push(slot.value);
      }
    });

    this.logger.info("Candidate analysis completed", {
      candidates: input.candidates.length,
      analyzed: analyses.filter((analysis) => analysis.ok).length,
      cancelled: cancelled.length,
    });
    return { analyses, cancelled, complete: cancelled.length === 0 };
  }

  private async analyzeCandidate(candidate: CandidateProfile, job?: JobProfile | null): Promise<CandidateAnalysis> {
    const startedAt = Date.now();
    const safe = await callJsonPromptSafe({
      llmClient: this.llmClient,
      prompt: buildCandidateAnalysisV1Prompt({ candidate, job }),
      maxTokens: 500,
      promptName: PROMPT_NAME,
      schemaHint: CANDIDATE_ANALYSIS_SCHEMA_HINT,
      logger: this.logger,
    });

    const analysis: CandidateAnalysis = safe.ok
      ? readAnalysis(candidate.name, safe.data)
      : { candidateName: candidate.name, ok: false, errorCode: safe.error_code };

    logContext(this.logger, analysis.ok ? "info" : "warn", "candidate.analysis.done", {
      action: "analyze",
      candidate_name: candidate.name,
      prompt_name: PROMPT_NAME,
      model_name: this.llmClient.getModelName?.(),
      latency_ms: Date.now() - startedAt,
      ok: analysis.ok,
      ...(analysis.ok ? {} : { error_code: analysis.errorCode }),
    });
    return analysis;
  }
}

function readAnalysis(candidateName: string, data: Record<string, unknown>): CandidateAnalysis {
  const summary = toText(data.summary);
  const strengths = toStringArray(data.strengths).slice(0, MAX_ITEMS);
  const improvementAreas = toStringArray(data.improvementAreas).slice(0, MAX_ITEMS);
  if (!summary && strengths.length === 0 && improvementAreas.length === 0) {
    return { candidateName, ok: false, errorCode: "empty_analysis" };
  }
  return { candidateName, ok: true, summary, strengths, improvementAreas };
}
