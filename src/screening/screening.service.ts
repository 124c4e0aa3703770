import { Logger } from "../config/logger";
import { RankingEngine } from "../matching/ranking.engine";
import { ProfileStandardizer, parseKillerCriteria, parsePreferences } from "../profiles/profile-standardizer.service";
import { StandardizationError, ValidationError, errorMessage } from "../shared/errors";
import {
  ComponentWeights,
  RankedCandidate,
  RankingOptions,
} from "../shared/types/matching.types";
import { CandidateProfile, JobProfile } from "../shared/types/profile.types";
import { linkAbort, runBounded } from "../shared/utils/bounded-pool";

export interface ResumeDocument {
  id: string;
  text: string;
}

export interface DocumentRankingInput {
  jobDescription: string;
  resumes: ReadonlyArray<ResumeDocument>;
  preferencesText?: string;
  killerSkillsText?: string;
  killerExperienceText?: string;
  weights?: ComponentWeights;
}

export interface ResumeFailure {
  resumeId: string;
  candidateName?: string;
  kind: "StandardizationError" | "ValidationError";
  message: string;
}

export interface ResumeRankedCandidate extends RankedCandidate {
  resumeId: string;
}

export interface DocumentRankingResult {
  job: JobProfile;
  ranking: ResumeRankedCandidate[];
  failures: ResumeFailure[];
  cancelled: string[];
  complete: boolean;
}

type StandardizedResume =
  | { ok: true; resumeId: string; profile: CandidateProfile }
  | { ok: false; failure: ResumeFailure };

export class ScreeningService {
  constructor(
    private readonly standardizer: ProfileStandardizer,
    private readonly rankingEngine: RankingEngine,
    private readonly logger: Logger,
    private readonly defaults: { concurrency?: number } = {},
  ) {}

  /**
   * Standardizes the job description and every résumé, then ranks the
   * résumés that produced a valid profile. Résumés that fail standardization
   * are reported, not fatal; a job description that fails is fatal.
   *
   * Standardization shares the ranking's concurrency bound, and one deadline
   * (`timeoutMs` or the caller's signal) covers both steps.
   */
  async rankDocuments(input: DocumentRankingInput, options?: RankingOptions): Promise<DocumentRankingResult> {
    const concurrency = options?.concurrency ?? this.defaults.concurrency;
    const deadline = linkAbort(options?.signal, options?.timeoutMs);

    try {
      const job = await this.standardizer.standardizeJob(input.jobDescription);
      const standardized = await runBounded(
        input.resumes.length,
        (index) => this.standardizeResume(input.resumes[index]),
        { concurrency, signal: deadline.signal },
      );

      const accepted: Array<{ resumeId: string; profile: CandidateProfile }> = [];
      const failures: ResumeFailure[] = [];
      const cancelled: string[] = [];
      standardized.forEach((slot, index) => {
        if (slot.status === "cancelled") {
          cancelled.push(input.resumes[index].id);
          return;
        }
        const item = slot.value;
        if (item.ok) {
          accepted.push({ resumeId: item.resumeId, profile: item.profile });
        } else {
          failures.push(item.failure);
        }
      });

      const result = await this.rankingEngine.rank(
        {
          job,
          candidates: accepted.map((item) => item.profile),
          recruiterPreferences: parsePreferences(input.preferencesText),
          killerCriteria: parseKillerCriteria({
            skillsText: input.killerSkillsText,
            experienceText: input.killerExperienceText,
          }),
          weights: input.weights,
        },
        { concurrency, signal: deadline.signal },
      );

      const resumeIdAt = (index: number): string => accepted[index]?.resumeId ?? `#${index}`;
      return {
        job,
        ranking: result.ranking.map((entry) => ({ ...entry, resumeId: resumeIdAt(entry.inputIndex) })),
        failures: [
          ...failures,
          ...result.failures.map((failure) => ({
            resumeId: resumeIdAt(failure.inputIndex),
            candidateName: failure.candidateName,
            kind: failure.kind,
            message: failure.message,
          })),
        ],
        cancelled: [...cancelled, ...result.cancelled.map(resumeIdAt)],
        complete: cancelled.length === 0 && result.complete,
      };
    } finally {
      deadline.dispose();
    }
  }

  private async standardizeResume(resume: ResumeDocument): Promise<StandardizedResume> {
    try {
      const profile = await this.standardizer.standardizeResume(resume.text, fallbackNameFromId(resume.id));
      return { ok: true, resumeId: resume.id, profile };
    } catch (error) {
      if (!(error instanceof StandardizationError) && !(error instanceof ValidationError)) {
        throw error;
      }
      this.logger.warn("Resume standardization failed", {
        resumeId: resume.id,
        kind: error.kind,
        error: errorMessage(error),
      });
      return {
        ok: false,
        failure: {
          resumeId: resume.id,
          ...(error instanceof ValidationError && error.candidateName ? { candidateName: error.candidateName } : {}),
          kind: error.kind,
          message: error.message,
        },
      };
    }
  }
}

/** "ana_garcia-cv.pdf" -> "ana garcia cv" */
export function fallbackNameFromId(resumeId: string): string {
  return resumeId
    .replace(/\.[a-z0-9]+$/i, "")
    .replace(/[_-]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}
