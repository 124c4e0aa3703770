import { ValidationError } from "../shared/errors";
import {
  CandidateProfile,
  JobProfile,
  KILLER_CATEGORIES,
  KillerCriteria,
  ProfileResult,
  RecruiterPreferences,
} from "../shared/types/profile.types";

const MAX_LIST_ITEMS = 60;
const MAX_TEXT = 4000;

export function createJobProfile(raw: unknown): ProfileResult<JobProfile> {
  if (!isRecord(raw)) {
    return invalid("job", "Job profile must be an object.");
  }

  const title = toText(raw.title);
  if (!title) {
    return invalid("title", "Job profile is missing a title.");
  }
  const requiredSkills = readStringList(raw, "requiredSkills", true);
  if (!requiredSkills.ok) {
    return requiredSkills;
  }
  const experienceRequirement = readRequiredText(raw, "experienceRequirement", "Job profile");
  if (!experienceRequirement.ok) {
    return experienceRequirement;
  }
  const educationRequirement = readRequiredText(raw, "educationRequirement", "Job profile");
  if (!educationRequirement.ok) {
    return educationRequirement;
  }
  const preferredSkills = readStringList(raw, "preferredSkills", false);
  if (!preferredSkills.ok) {
    return preferredSkills;
  }

  return {
    ok: true,
    value: Object.freeze({
      title,
      requiredSkills: Object.freeze(requiredSkills.value),
      experienceRequirement: experienceRequirement.value,
      educationRequirement: educationRequirement.value,
      preferredSkills: Object.freeze(preferredSkills.value),
    }),
  };
}

export function createCandidateProfile(raw: unknown): ProfileResult<CandidateProfile> {
  if (!isRecord(raw)) {
    return invalid("candidate", "Candidate profile must be an object.");
  }

  const name = toText(raw.name);
  if (!name) {
    return invalid("name", "Candidate profile is missing a name.");
  }
  const skills = readStringList(raw, "skills", true);
  if (!skills.ok) {
    return withCandidate(skills, name);
  }
  const experience = readRequiredText(raw, "experience", "Candidate profile");
  if (!experience.ok) {
    return withCandidate(experience, name);
  }
  const education = readRequiredText(raw, "education", "Candidate profile");
  if (!education.ok) {
    return withCandidate(education, name);
  }

  const profile: CandidateProfile = {
    name,
    skills: Object.freeze(skills.value),
    experience: experience.value,
    education: education.value,
    ...(isRecord(raw.rawData) ? { rawData: Object.freeze({ ...raw.rawData }) } : {}),
  };
  return { ok: true, value: Object.freeze(profile) };
}

export function assertJobProfile(raw: unknown): JobProfile {
  const result = createJobProfile(raw);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

export function assertCandidateProfile(raw: unknown): CandidateProfile {
  const result = createCandidateProfile(raw);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Profiles that reach the scorer without passing through the constructors
 * above (plain objects built by callers) are re-checked here.
 */
export function validateJobProfile(job: JobProfile): void {
  assertJobProfile(job);
}

export function validateCandidateProfile(candidate: CandidateProfile): void {
  assertCandidateProfile(candidate);
}

export function createRecruiterPreferences(raw: unknown): ProfileResult<RecruiterPreferences | null> {
  if (raw === undefined || raw === null) {
    return { ok: true, value: null };
  }
  if (!isRecord(raw)) {
    return invalid("recruiterPreferences", "Recruiter preferences must be an object.");
  }
  const preferredSkills = readStringList(raw, "preferredSkills", false);
  if (!preferredSkills.ok) {
    return preferredSkills;
  }
  const rawText = toText(raw.rawText);
  return {
    ok: true,
    value: Object.freeze({
      preferredSkills: Object.freeze(preferredSkills.value),
      ...(rawText ? { rawText } : {}),
    }),
  };
}

export function createKillerCriteria(raw: unknown): ProfileResult<KillerCriteria | null> {
  if (raw === undefined || raw === null) {
    return { ok: true, value: null };
  }
  if (!isRecord(raw)) {
    return invalid("killerCriteria", "Killer criteria must be an object.");
  }

  const unknownKeys = Object.keys(raw).filter(
    (key) => !KILLER_CATEGORIES.some((category) => category === key),
  );
  if (unknownKeys.length > 0) {
    return invalid("killerCriteria", `Unknown killer criteria categories: ${unknownKeys.join(", ")}.`);
  }

  const mandatorySkills = readStringList(raw, "mandatorySkills", false);
  if (!mandatorySkills.ok) {
    return mandatorySkills;
  }
  const mandatoryExperience = readStringList(raw, "mandatoryExperience", false);
  if (!mandatoryExperience.ok) {
    return mandatoryExperience;
  }

  return {
    ok: true,
    value: Object.freeze({
      mandatorySkills: Object.freeze(mandatorySkills.value),
      mandatoryExperience: Object.freeze(mandatoryExperience.value),
    }),
  };
}

export function hasKillerCriteria(criteria: KillerCriteria | null | undefined): criteria is KillerCriteria {
  if (!criteria) {
    return false;
  }
  return KILLER_CATEGORIES.some((category) => (criteria[category] ?? []).some((term) => term.trim()));
}

function readRequiredText(
  source: Record<string, unknown>,
  field: string,
  owner: string,
): ProfileResult<string> {
  const value = source[field];
  if (typeof value !== "string") {
    return invalid(field, `${owner} field "${field}" must be a string.`);
  }
  return { ok: true, value: toText(value) };
}

function readStringList(
  source: Record<string, unknown>,
  field: string,
  required: boolean,
): ProfileResult<string[]> {
  const value = source[field];
  if (value === undefined || value === null) {
    if (required) {
      return invalid(field, `Field "${field}" is required.`);
    }
    return { ok: true, value: [] };
  }
  if (!Array.isArray(value)) {
    return invalid(field, `Field "${field}" must be a list of strings.`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") {
      return invalid(field, `Field "${field}" must only contain strings.`);
    }
    const text = toText(item);
    if (text) {
      items.push(text);
    }
  }
  return { ok: true, value: items.slice(0, MAX_LIST_ITEMS) };
}

function withCandidate<T>(result: { ok: false; error: ValidationError }, name: string): ProfileResult<T> {
  return { ok: false, error: result.error.forCandidate(name) };
}

function invalid<T>(field: string, message: string): ProfileResult<T> {
  return { ok: false, error: new ValidationError(field, message) };
}

export function toText(value: unknown): string {
  if (typeof value !== "string") {
    return "";
  }
  return value.replace(/\s+/g, " ").trim().slice(0, MAX_TEXT);
}

export function toStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((item) => toText(item))
    .filter((item) => Boolean(item))
    .slice(0, MAX_LIST_ITEMS);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
