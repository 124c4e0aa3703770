import { Logger } from "../../config/logger";
import { validateCandidateProfile, validateJobProfile } from "../../profiles/profile.schemas";
import { ConfigurationError } from "../../shared/errors";
import {
  ComponentDebug,
  ComponentScores,
  ComponentWeights,
  MATCH_COMPONENTS,
  MatchComponent,
  MatchDebugInfo,
  MatchScore,
  ScoreInput,
} from "../../shared/types/matching.types";
import { JobProfile, RecruiterPreferences } from "../../shared/types/profile.types";
import { CriteriaEvaluator } from "../criteria.evaluator";
import { SimilarityScorer, clampUnit } from "../similarity.scorer";

const NEUTRAL_SCORE = 1;
const LIST_SEPARATOR = ", ";

interface ComponentInput {
  jobText: string;
  candidateText: string;
}

interface WeightingResult {
  finalScore: number;
  weightsUsed: ComponentWeights;
  weightingMode: MatchDebugInfo["weightingMode"];
}

export class MatchScorer {
  constructor(
    private readonly similarityScorer: SimilarityScorer,
    private readonly criteriaEvaluator: CriteriaEvaluator,
    private readonly logger: Logger,
  ) {}

  async score(input: ScoreInput): Promise<MatchScore> {
    validateJobProfile(input.job);
    validateCandidateProfile(input.candidate);
    validateWeights(input.weights);

    const verdict = await this.criteriaEvaluator.evaluate(input.candidate, input.killerCriteria, input.signal);

    const preference = resolvePreferenceSkills(input.job, input.recruiterPreferences);
    const inputs: Record<Exclude<MatchComponent, "recruiterPreferences">, ComponentInput> = {
      skills: {
        jobText: input.job.requiredSkills.join(LIST_SEPARATOR),
        candidateText: input.candidate.skills.join(LIST_SEPARATOR),
      },
      experience: {
        jobText: input.job.experienceRequirement,
        candidateText: input.candidate.experience,
      },
      education: {
        jobText: input.job.educationRequirement,
        candidateText: input.candidate.education,
      },
    };

    const [skills, experience, education] = await Promise.all([
      this.compareComponent(inputs.skills, input.signal),
      this.compareComponent(inputs.experience, input.signal),
      this.compareComponent(inputs.education, input.signal),
    ]);
    const recruiterPreferences: ComponentDebug =
      preference.skills.length > 0
        ? await this.compareComponent(
            {
              jobText: preference.skills.join(LIST_SEPARATOR),
              candidateText: input.candidate.skills.join(LIST_SEPARATOR),
            },
            input.signal,
          )
        : {
            jobText: "",
            candidateText: input.candidate.skills.join(LIST_SEPARATOR),
            similarity: NEUTRAL_SCORE,
            method: "neutral",
          };

    const components: Record<MatchComponent, ComponentDebug> = {
      skills,
      experience,
      education,
      recruiterPreferences,
    };
    const componentScores: ComponentScores = Object.freeze({
      skills: skills.similarity,
      experience: experience.similarity,
      education: education.similarity,
      recruiterPreferences: recruiterPreferences.similarity,
    });
    const neutralComponents: MatchComponent[] = preference.skills.length > 0 ? [] : ["recruiterPreferences"];
    const weighting = combineComponentScores(componentScores, input.weights, neutralComponents);

    const debugInfo: MatchDebugInfo = Object.freeze({
      components: Object.freeze(components),
      weightsProvided: Object.freeze({ ...input.weights }),
      weightsUsed: Object.freeze(weighting.weightsUsed),
      neutralComponents: Object.freeze(neutralComponents),
      weightingMode: weighting.weightingMode,
      preferenceSource: preference.source,
    });

    if (!verdict.passes) {
      this.logger.info("Candidate disqualified by killer criteria", {
        candidate: input.candidate.name,
        reasons: verdict.reasons,
      });
      return Object.freeze({
        finalScore: 0,
        componentScores,
        disqualified: true,
        disqualificationReasons: Object.freeze([...verdict.reasons]),
        debugInfo,
      });
    }

    return Object.freeze({
      finalScore: weighting.finalScore,
      componentScores,
      disqualified: false,
      disqualificationReasons: Object.freeze([]),
      debugInfo,
    });
  }

  private async compareComponent(input: ComponentInput, signal?: AbortSignal): Promise<ComponentDebug> {
    const result = await this.similarityScorer.compare(input.jobText, input.candidateText, signal);
    return {
      jobText: input.jobText,
      candidateText: input.candidateText,
      similarity: result.score,
      method: result.method,
      ...(result.degradedKind ? { degradedKind: result.degradedKind } : {}),
    };
  }
}

/**
 * Weighted mean over the active (non-neutral) components. When every active
 * weight is zero the plain mean of the active scores is used instead.
 */
export function combineComponentScores(
  scores: ComponentScores,
  weights: ComponentWeights,
  neutralComponents: ReadonlyArray<MatchComponent>,
): WeightingResult {
  validateWeights(weights);

  const active = MATCH_COMPONENTS.filter((component) => !neutralComponents.includes(component));
  if (active.length === 0) {
    throw new ConfigurationError("No component scores available to combine.");
  }

  const weightsUsed: ComponentWeights = {
    skills: 0,
    experience: 0,
    education: 0,
    recruiterPreferences: 0,
  };
  const totalWeight = active.reduce((sum, component) => sum + weights[component], 0);

  if (totalWeight > 0) {
    let weighted = 0;
    for (const component of active) {
      weightsUsed[component] = weights[component] / totalWeight;
      weighted += weights[component] * scores[component];
    }
    return {
      finalScore: clampUnit(weighted / totalWeight),
      weightsUsed,
      weightingMode: "weighted",
    };
  }

  let sum = 0;
  for (const component of active) {
    weightsUsed[component] = 1 / active.length;
    sum += scores[component];
  }
  return {
    finalScore: clampUnit(sum / active.length),
    weightsUsed,
    weightingMode: "unweighted_mean",
  };
}

export function validateWeights(weights: ComponentWeights): void {
  for (const component of MATCH_COMPONENTS) {
    const weight = weights[component];
    if (typeof weight !== "number" || !Number.isFinite(weight) || weight < 0) {
      throw new ConfigurationError(
        `Weight for "${component}" must be a finite non-negative number, got ${String(weight)}.`,
      );
    }
  }
}

function resolvePreferenceSkills(
  job: JobProfile,
  preferences: RecruiterPreferences | null | undefined,
): { skills: ReadonlyArray<string>; source: MatchDebugInfo["preferenceSource"] } {
  const recruiterSkills = (preferences?.preferredSkills ?? []).filter((skill) => skill.trim());
  if (recruiterSkills.length > 0) {
    return { skills: recruiterSkills, source: "recruiter" };
  }
  const jobSkills = job.preferredSkills.filter((skill) => skill.trim());
  if (jobSkills.length > 0) {
    return { skills: jobSkills, source: "job" };
  }
  return { skills: [], source: "none" };
}
