import { MatchComponent, MatchScore, RankedCandidate } from "../shared/types/matching.types";

const HIGH_SCORE_THRESHOLD = 0.7;
const MEDIUM_SCORE_THRESHOLD = 0.4;
const MAX_SKILLS_PREVIEW = 5;
const MAX_TEXT_PREVIEW = 160;

export type ScoreBand = "high" | "medium" | "low" | "disqualified";

export interface RankingReportRow {
  rank: number;
  inputIndex: number;
  candidateName: string;
  status: "qualified" | "disqualified";
  band: ScoreBand;
  finalScore: string;
  componentScores: Record<MatchComponent, string>;
  skills: string;
  experience: string;
  education: string;
  disqualificationReasons: string;
}

export function scoreBand(score: Pick<MatchScore, "finalScore" | "disqualified">): ScoreBand {
  if (score.disqualified) {
    return "disqualified";
  }
  if (score.finalScore >= HIGH_SCORE_THRESHOLD) {
    return "high";
  }
  if (score.finalScore >= MEDIUM_SCORE_THRESHOLD) {
    return "medium";
  }
  return "low";
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function formatListPreview(items: ReadonlyArray<string>, maxItems = MAX_SKILLS_PREVIEW): string {
  const preview = items.slice(0, maxItems).join(", ");
  return items.length > maxItems ? `${preview}...` : preview;
}

export function formatTextPreview(text: string, maxChars = MAX_TEXT_PREVIEW): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars - 3)}...`;
}

export function buildReportRows(ranking: ReadonlyArray<RankedCandidate>): RankingReportRow[] {
  return ranking.map((entry, position): RankingReportRow => {
    const scores = entry.score.componentScores;
    return {
      rank: position + 1,
      inputIndex: entry.inputIndex,
      candidateName: entry.candidate.name,
      status: entry.score.disqualified ? "disqualified" : "qualified",
      band: scoreBand(entry.score),
      finalScore: formatPercent(entry.score.finalScore),
      componentScores: {
        skills: formatPercent(scores.skills),
        experience: formatPercent(scores.experience),
        education: formatPercent(scores.education),
        recruiterPreferences: formatPercent(scores.recruiterPreferences),
      },
      skills: formatListPreview(entry.candidate.skills),
      experience: formatTextPreview(entry.candidate.experience),
      education: formatTextPreview(entry.candidate.education),
      disqualificationReasons: entry.score.disqualificationReasons.join(", ") || "N/A",
    };
  });
}
