import { StructuredJsonClient } from "../ai/llm.client";
import { SafeJsonResult, callJsonPromptSafe } from "../ai/llm.safe";
import {
  JOB_STANDARDIZATION_SCHEMA_HINT,
  buildJobStandardizationV1Prompt,
} from "../ai/prompts/profiles/job-standardization.v1.prompt";
import {
  RESUME_STANDARDIZATION_SCHEMA_HINT,
  buildResumeStandardizationV1Prompt,
} from "../ai/prompts/profiles/resume-standardization.v1.prompt";
import { Logger, logContext } from "../config/logger";
import { StandardizationError } from "../shared/errors";
import {
  CandidateProfile,
  JobProfile,
  KillerCriteria,
  RecruiterPreferences,
} from "../shared/types/profile.types";
import { assertCandidateProfile, assertJobProfile, toStringArray, toText } from "./profile.schemas";

const MAX_DOCUMENT_CHARS = 12_000;

export class ProfileStandardizer {
  constructor(
    private readonly llmClient: StructuredJsonClient,
    private readonly logger: Logger,
  ) {}

  async standardizeJob(jobDescription: string): Promise<JobProfile> {
    const text = jobDescription.trim();
    if (!text) {
      throw new StandardizationError("empty_input", "Job description is empty.");
    }

    const safe = await this.callPrompt(
      "job_standardization_v1",
      buildJobStandardizationV1Prompt(text.slice(0, MAX_DOCUMENT_CHARS)),
      JOB_STANDARDIZATION_SCHEMA_HINT,
    );
    if (!safe.ok) {
      throw new StandardizationError(
        safe.error_code,
        `job_standardization_v1_failed:${safe.error_code}`,
      );
    }

    return assertJobProfile({
      title: toText(safe.data.title),
      requiredSkills: toStringArray(safe.data.requiredSkills),
      experienceRequirement: toText(safe.data.experienceRequirement),
      educationRequirement: toText(safe.data.educationRequirement),
      preferredSkills: toStringArray(safe.data.preferredSkills),
    });
  }

  async standardizeResume(resumeText: string, fallbackName?: string): Promise<CandidateProfile> {
    const text = resumeText.trim();
    if (!text) {
      throw new StandardizationError("empty_input", "Résumé text is empty.");
    }

    const safe = await this.callPrompt(
      "resume_standardization_v1",
      buildResumeStandardizationV1Prompt(text.slice(0, MAX_DOCUMENT_CHARS)),
      RESUME_STANDARDIZATION_SCHEMA_HINT,
    );
    if (!safe.ok) {
      throw new StandardizationError(
        safe.error_code,
        `resume_standardization_v1_failed:${safe.error_code}`,
      );
    }

    return assertCandidateProfile({
      name: toText(safe.data.name) || toText(fallbackName),
      skills: toStringArray(safe.data.skills),
      experience: toText(safe.data.experience),
      education: toText(safe.data.education),
      rawData: safe.data,
    });
  }

  private async callPrompt(promptName: string, prompt: string, schemaHint: string): Promise<SafeJsonResult> {
    const startedAt = Date.now();
    const safe = await callJsonPromptSafe({
      llmClient: this.llmClient,
      prompt,
      maxTokens: 700,
      promptName,
      schemaHint,
      logger: this.logger,
    });
    logContext(this.logger, safe.ok ? "info" : "warn", "profile.standardize.done", {
      action: "standardize",
      prompt_name: promptName,
      model_name: this.llmClient.getModelName?.(),
      latency_ms: Date.now() - startedAt,
      ok: safe.ok,
      ...(safe.ok ? {} : { error_code: safe.error_code }),
    });
    return safe;
  }
}

/** One preferred skill per line; bullets and blank lines are ignored. */
export function parsePreferences(text: string | undefined): RecruiterPreferences | null {
  const preferredSkills = splitLines(text);
  if (preferredSkills.length === 0) {
    return null;
  }
  return Object.freeze({
    preferredSkills: Object.freeze(preferredSkills),
    rawText: (text ?? "").trim(),
  });
}

export function parseKillerCriteria(input: {
  skillsText?: string;
  experienceText?: string;
}): KillerCriteria | null {
  const mandatorySkills = splitLines(input.skillsText);
  const mandatoryExperience = splitLines(input.experienceText);
  if (mandatorySkills.length === 0 && mandatoryExperience.length === 0) {
    return null;
  }
  return Object.freeze({
    mandatorySkills: Object.freeze(mandatorySkills),
    mandatoryExperience: Object.freeze(mandatoryExperience),
  });
}

export function splitLines(text: string | undefined): string[] {
  return (text ?? "")
    .split(/\r?\n/)
    .map((line) => line.replace(/^\s*(?:[-*•]|\d+[.)])\s+/, "").trim())
    .filter((line) => line.length > 0);
}
