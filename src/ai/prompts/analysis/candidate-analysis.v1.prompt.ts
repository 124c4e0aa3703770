import { CandidateProfile, JobProfile } from "../../../shared/types/profile.types";

export const CANDIDATE_ANALYSIS_SCHEMA_HINT =
  "Object with summary (string), strengths (string[]), improvementAreas (string[]).";

const NOT_STATED = "Not stated";

export function buildCandidateAnalysisV1Prompt(input: {
  candidate: CandidateProfile;
  job?: JobProfile | null;
}): string {
  const lines = [
    "Task: review the candidate profile below and summarize the candidate's strengths and areas to improve.",
    "Return STRICT JSON only.",
    "",
    "Output schema:",
    "{",
    '  "summary": "two or three sentences on overall fit",',
    '  "strengths": ["strength1", "strength2"],',
    '  "improvementAreas": ["area1", "area2"]',
    "}",
    "",
    "Rules:",
    "- Base every point on the profile; do not invent experience.",
    "- At most 5 strengths and 5 improvement areas, each one short sentence.",
  ];

  if (input.job) {
    lines.push(
      "- Judge fit against the role below.",
      "",
      "Role:",
      `Title: ${input.job.title}`,
      `Required skills: ${listOrNotStated(input.job.requiredSkills)}`,
      `Experience: ${input.job.experienceRequirement || NOT_STATED}`,
      `Education: ${input.job.educationRequirement || NOT_STATED}`,
    );
  }

  lines.push(
    "",
    "Candidate:",
    `Name: ${input.candidate.name}`,
    `Experience: ${input.candidate.experience || NOT_STATED}`,
    `Skills: ${listOrNotStated(input.candidate.skills)}`,
    `Education: ${input.candidate.education || NOT_STATED}`,
  );
  return lines.join("\n");
}

function listOrNotStated(items: ReadonlyArray<string>): string {
  return items.length > 0 ? items.join(", ") : NOT_STATED;
}
