import { ValidationError } from "../errors";

export interface JobProfile {
  readonly title: string;
  readonly requiredSkills: ReadonlyArray<string>;
  readonly experienceRequirement: string;
  readonly educationRequirement: string;
  readonly preferredSkills: ReadonlyArray<string>;
}

export interface CandidateProfile {
  readonly name: string;
  readonly skills: ReadonlyArray<string>;
  readonly experience: string;
  readonly education: string;
  /** Unstructured extraction output, kept for audit only. Never scored. */
  readonly rawData?: Readonly<Record<string, unknown>>;
}

export interface RecruiterPreferences {
  readonly preferredSkills: ReadonlyArray<string>;
  readonly rawText?: string;
}

export interface KillerCriteria {
  readonly mandatorySkills?: ReadonlyArray<string>;
  readonly mandatoryExperience?: ReadonlyArray<string>;
}

export type KillerCategory = keyof KillerCriteria;

export const KILLER_CATEGORIES: ReadonlyArray<KillerCategory> = ["mandatorySkills", "mandatoryExperience"];

export type ProfileResult<T> =
  | {
      ok: true;
      value: T;
    }
  | {
      ok: false;
      error: ValidationError;
    };
