import { EmbeddingErrorKind } from "../errors";
import { CandidateProfile, JobProfile, KillerCriteria, RecruiterPreferences } from "./profile.types";

export type MatchComponent = "skills" | "experience" | "education" | "recruiterPreferences";

export const MATCH_COMPONENTS: ReadonlyArray<MatchComponent> = [
  "skills",
  "experience",
  "education",
  "recruiterPreferences",
];

export type ComponentWeights = Record<MatchComponent, number>;

export type ComponentScores = Readonly<Record<MatchComponent, number>>;

export type SimilarityMethod = "embedding" | "token_overlap";

export interface SimilarityResult {
  score: number;
  method: SimilarityMethod;
  degradedKind?: EmbeddingErrorKind;
}

export interface ComponentDebug {
  readonly jobText: string;
  readonly candidateText: string;
  readonly similarity: number;
  readonly method: SimilarityMethod | "neutral";
  readonly degradedKind?: EmbeddingErrorKind;
}

export interface MatchDebugInfo {
  readonly components: Readonly<Record<MatchComponent, ComponentDebug>>;
  readonly weightsProvided: Readonly<ComponentWeights>;
  readonly weightsUsed: Readonly<ComponentWeights>;
  readonly neutralComponents: ReadonlyArray<MatchComponent>;
  readonly weightingMode: "weighted" | "unweighted_mean";
  readonly preferenceSource: "recruiter" | "job" | "none";
}

export interface MatchScore {
  readonly finalScore: number;
  readonly componentScores: ComponentScores;
  readonly disqualified: boolean;
  readonly disqualificationReasons: ReadonlyArray<string>;
  readonly debugInfo: MatchDebugInfo;
}

export interface CriteriaVerdict {
  passes: boolean;
  reasons: string[];
}

export interface ScoreInput {
  job: JobProfile;
  candidate: CandidateProfile;
  weights: ComponentWeights;
  killerCriteria?: KillerCriteria | null;
  recruiterPreferences?: RecruiterPreferences | null;
  /** Aborts in-flight embedding requests once the ranking gives up on this candidate. */
  signal?: AbortSignal;
}

export interface RankingInput {
  job: JobProfile;
  candidates: ReadonlyArray<CandidateProfile>;
  recruiterPreferences?: RecruiterPreferences | null;
  killerCriteria?: KillerCriteria | null;
  weights?: ComponentWeights;
}

export interface RankingOptions {
  concurrency?: number;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface RankedCandidate {
  /** Position of the candidate in the caller's input sequence. */
  readonly inputIndex: number;
  readonly candidate: CandidateProfile;
  readonly score: MatchScore;
}

export interface CandidateFailure {
  readonly inputIndex: number;
  readonly candidateName: string;
  readonly kind: "ValidationError";
  readonly field: string;
  readonly message: string;
}

export interface RankingResult {
  ranking: RankedCandidate[];
  failures: CandidateFailure[];
  cancelled: number[];
  complete: boolean;
}
