import {
  createCandidateProfile,
  createJobProfile,
  createKillerCriteria,
  createRecruiterPreferences,
  isRecord,
} from "../profiles/profile.schemas";
import { ResumeDocument } from "../screening/screening.service";
import { ConfigurationError, ValidationError } from "../shared/errors";
import {
  CandidateFailure,
  ComponentWeights,
  MATCH_COMPONENTS,
  RankingInput,
  RankingOptions,
} from "../shared/types/matching.types";
import { CandidateProfile, JobProfile } from "../shared/types/profile.types";

export interface ParsedRankingRequest {
  input: RankingInput;
  options: RankingOptions;
  /** Maps a position in `input.candidates` back to the position in the request body. */
  requestIndexes: number[];
  rejected: CandidateFailure[];
}

export interface ParsedAnalysisRequest {
  candidates: CandidateProfile[];
  job: JobProfile | null;
  options: RankingOptions;
}

export interface ParsedDocumentRequest {
  jobDescription: string;
  resumes: ResumeDocument[];
  preferencesText?: string;
  killerSkillsText?: string;
  killerExperienceText?: string;
  weights?: ComponentWeights;
  options: RankingOptions;
}

/**
 * Invalid job, criteria, preferences or weights fail the whole request;
 * an invalid candidate only lands in `rejected`.
 */
export function parseRankingRequest(body: unknown, defaults: ComponentWeights): ParsedRankingRequest {
  if (!isRecord(body)) {
    throw new ValidationError("body", "Request body must be a JSON object.");
  }

  const job = createJobProfile(body.job);
  if (!job.ok) {
    throw job.error;
  }
  if (!Array.isArray(body.candidates)) {
    throw new ValidationError("candidates", "Field \"candidates\" must be a list.");
  }
  const killerCriteria = createKillerCriteria(body.killerCriteria);
  if (!killerCriteria.ok) {
    throw killerCriteria.error;
  }
  const recruiterPreferences = createRecruiterPreferences(body.recruiterPreferences);
  if (!recruiterPreferences.ok) {
    throw recruiterPreferences.error;
  }

  const candidates: CandidateProfile[] = [];
  const requestIndexes: number[] = [];
  const rejected: CandidateFailure[] = [];
  body.candidates.forEach((raw: unknown, index: number) => {
    const candidate = createCandidateProfile(raw);
    if (candidate.ok) {
      candidates.push(candidate.value);
      requestIndexes.push(index);
      return;
    }
    rejected.push({
      inputIndex: index,
      candidateName: candidate.error.candidateName ?? "unknown",
      kind: candidate.error.kind,
      field: candidate.error.field,
      message: candidate.error.message,
    });
  });

  return {
    input: {
      job: job.value,
      candidates,
      killerCriteria: killerCriteria.value,
      recruiterPreferences: recruiterPreferences.value,
      weights: parseWeightsBody(body.weights, defaults),
    },
    options: parseRankingOptions(body),
    requestIndexes,
    rejected,
  };
}

export function parseDocumentRequest(body: unknown, defaults: ComponentWeights): ParsedDocumentRequest {
  if (!isRecord(body)) {
    throw new ValidationError("body", "Request body must be a JSON object.");
  }
  if (typeof body.jobDescription !== "string" || !body.jobDescription.trim()) {
    throw new ValidationError("jobDescription", "Field \"jobDescription\" must be a non-empty string.");
  }
  if (!Array.isArray(body.resumes)) {
    throw new ValidationError("resumes", "Field \"resumes\" must be a list.");
  }

  const resumes = body.resumes.map((raw: unknown, index: number): ResumeDocument => {
    if (!isRecord(raw) || typeof raw.text !== "string") {
      throw new ValidationError("resumes", `Resume #${index} must be an object with a "text" string.`);
    }
    const id = typeof raw.id === "string" && raw.id.trim() ? raw.id.trim() : `resume-${index + 1}`;
    return { id, text: raw.text };
  });

  return {
    jobDescription: body.jobDescription,
    resumes,
    preferencesText: optionalString(body.preferencesText),
    killerSkillsText: optionalString(body.killerSkillsText),
    killerExperienceText: optionalString(body.killerExperienceText),
    weights: parseWeightsBody(body.weights, defaults),
    options: parseRankingOptions(body),
  };
}

/** Every listed candidate must be a valid profile; the job is optional context. */
export function parseAnalysisRequest(body: unknown): ParsedAnalysisRequest {
  if (!isRecord(body)) {
    throw new ValidationError("body", "Request body must be a JSON object.");
  }
  if (!Array.isArray(body.candidates) || body.candidates.length === 0) {
    throw new ValidationError("candidates", "Field \"candidates\" must be a non-empty list.");
  }

  const candidates = body.candidates.map((raw: unknown): CandidateProfile => {
    const candidate = createCandidateProfile(raw);
    if (!candidate.ok) {
      throw candidate.error;
    }
    return candidate.value;
  });

  let job: JobProfile | null = null;
  if (body.job !== undefined && body.job !== null) {
    const parsedJob = createJobProfile(body.job);
    if (!parsedJob.ok) {
      throw parsedJob.error;
    }
    job = parsedJob.value;
  }

  return { candidates, job, options: parseRankingOptions(body) };
}

export function parseWeightsBody(raw: unknown, defaults: ComponentWeights): ComponentWeights {
  if (raw === undefined || raw === null) {
    return defaults;
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError("Weights must be an object.");
  }

  const weights: ComponentWeights = { ...defaults };
  for (const component of MATCH_COMPONENTS) {
    const value = raw[component];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      throw new ConfigurationError(`Weight for "${component}" must be a finite non-negative number.`);
    }
    weights[component] = value;
  }
  return weights;
}

function parseRankingOptions(body: Record<string, unknown>): RankingOptions {
  const options: RankingOptions = {};
  if (body.concurrency !== undefined) {
    if (typeof body.concurrency !== "number" || !Number.isInteger(body.concurrency) || body.concurrency < 1) {
      throw new ValidationError("concurrency", "Field \"concurrency\" must be a positive integer.");
    }
    options.concurrency = body.concurrency;
  }
  if (body.timeoutMs !== undefined) {
    if (typeof body.timeoutMs !== "number" || !Number.isFinite(body.timeoutMs) || body.timeoutMs <= 0) {
      throw new ValidationError("timeoutMs", "Field \"timeoutMs\" must be a positive number.");
    }
    options.timeoutMs = body.timeoutMs;
  }
  return options;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}
