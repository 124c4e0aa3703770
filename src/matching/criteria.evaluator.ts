import { Logger } from "../config/logger";
import { hasKillerCriteria } from "../profiles/profile.schemas";
import { CriteriaVerdict } from "../shared/types/matching.types";
import { CandidateProfile, KillerCriteria } from "../shared/types/profile.types";
import { SimilarityScorer, tokenList } from "./similarity.scorer";

const YEARS_UNIT = "(?:years?|yrs?|años?|anos?)";
const YEARS_RANGE_PATTERN = new RegExp(`(\\d+(?:[.,]\\d+)?)\\s*(?:-|–|to|a)\\s*\\d+(?:[.,]\\d+)?\\s*${YEARS_UNIT}`, "i");
const YEARS_PATTERN = new RegExp(`(\\d+(?:[.,]\\d+)?)\\s*\\+?\\s*${YEARS_UNIT}`, "gi");

interface CriteriaEvaluatorOptions {
  /**
   * Minimum similarity for a term that fails the lexical check to still count
   * as satisfied. Lexical matching only when undefined.
   */
  softMatchThreshold?: number;
}

export class CriteriaEvaluator {
  private readonly softMatchThreshold?: number;

  constructor(
    private readonly similarityScorer: SimilarityScorer,
    private readonly logger: Logger,
    options?: CriteriaEvaluatorOptions,
  ) {
    this.softMatchThreshold = options?.softMatchThreshold;
  }

  async evaluate(
    candidate: CandidateProfile,
    killerCriteria?: KillerCriteria | null,
    signal?: AbortSignal,
  ): Promise<CriteriaVerdict> {
    if (!hasKillerCriteria(killerCriteria)) {
      return { passes: true, reasons: [] };
    }

    const reasons: string[] = [];

    for (const term of cleanTerms(killerCriteria.mandatorySkills)) {
      if (!(await this.hasSkill(candidate, term, signal))) {
        reasons.push(`Missing mandatory skill: ${term}`);
      }
    }

    for (const term of cleanTerms(killerCriteria.mandatoryExperience)) {
      if (!(await this.meetsExperience(candidate, term, signal))) {
        reasons.push(`Unmet mandatory experience: ${term}`);
      }
    }

    if (reasons.length > 0) {
      this.logger.debug("Killer criteria not met", {
        candidate: candidate.name,
        reasons,
      });
    }

    return { passes: reasons.length === 0, reasons };
  }

  private async hasSkill(candidate: CandidateProfile, term: string, signal?: AbortSignal): Promise<boolean> {
    if (candidate.skills.some((skill) => skillMatchesTerm(skill, term))) {
      return true;
    }
    if (this.softMatchThreshold === undefined || candidate.skills.length === 0) {
      return false;
    }

    const scores = await Promise.all(
      candidate.skills.map((skill) => this.similarityScorer.similarity(term, skill, signal)),
    );
    return Math.max(...scores) >= this.softMatchThreshold;
  }

  private async meetsExperience(
    candidate: CandidateProfile,
    term: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const requiredYears = extractRequiredYears(term);
    // Only the figure is checked: "5+ years of Java" is met by "10 years as a chef".
    if (requiredYears !== null) {
      return extractStatedYears(candidate.experience) >= requiredYears;
    }

    if (containsPhrase(candidate.experience, term)) {
      return true;
    }
    if (this.softMatchThreshold === undefined || !candidate.experience.trim()) {
      return false;
    }

    const score = await this.similarityScorer.similarity(term, candidate.experience, signal);
    return score >= this.softMatchThreshold;
  }
}

/** Case-insensitive substring containment in either direction: "SQL" matches "PostgreSQL". */
export function skillMatchesTerm(skill: string, term: string): boolean {
  const left = normalizeText(skill);
  const right = normalizeText(term);
  if (!left || !right) {
    return false;
  }
  return left.includes(right) || right.includes(left);
}

/** Case-insensitive whole-word phrase containment, used for experience terms. */
export function containsPhrase(haystack: string, needle: string): boolean {
  const haystackTokens = tokenList(haystack);
  const needleTokens = tokenList(needle);
  if (needleTokens.length === 0 || needleTokens.length > haystackTokens.length) {
    return false;
  }

  for (let start = 0; start <= haystackTokens.length - needleTokens.length; start += 1) {
    const matches = needleTokens.every((token, offset) => haystackTokens[start + offset] === token);
    if (matches) {
      return true;
    }
  }
  return false;
}

/** Minimum years stated by a requirement such as "5+ years" or "3-5 years", or null. */
export function extractRequiredYears(text: string): number | null {
  const range = YEARS_RANGE_PATTERN.exec(text);
  if (range) {
    return parseYears(range[1]);
  }
  const single = new RegExp(YEARS_PATTERN.source, "i").exec(text);
  return single ? parseYears(single[1]) : null;
}

/** Largest years figure stated in free experience text; 0 when none. */
export function extractStatedYears(text: string): number {
  let best = 0;
  for (const match of text.matchAll(YEARS_PATTERN)) {
    best = Math.max(best, parseYears(match[1]));
  }
  return best;
}

function parseYears(raw: string): number {
  const value = Number(raw.replace(",", "."));
  return Number.isFinite(value) ? value : 0;
}

function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

function cleanTerms(terms: ReadonlyArray<string> | undefined): string[] {
  return (terms ?? []).map((term) => term.trim()).filter((term) => term.length > 0);
}
