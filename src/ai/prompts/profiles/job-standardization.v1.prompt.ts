export const JOB_STANDARDIZATION_SCHEMA_HINT =
  "Object with title (string), requiredSkills (string[]), experienceRequirement (string), educationRequirement (string), preferredSkills (string[]).";

export function buildJobStandardizationV1Prompt(jobDescription: string): string {
  return [
    "Task: extract a standardized job profile from the job description below.",
    "Return STRICT JSON only.",
    "",
    "Output schema:",
    "{",
    '  "title": "job title",',
    '  "requiredSkills": ["skill1", "skill2"],',
    '  "experienceRequirement": "years of experience, industries, domain knowledge and responsibilities required",',
    '  "educationRequirement": "required and preferred education level, certifications",',
    '  "preferredSkills": ["nice-to-have skill"]',
    "}",
    "",
    "Rules:",
    "- requiredSkills lists mandatory technical and professional skills, most important first.",
    "- preferredSkills lists only skills the text marks as a plus, nice to have or preferred.",
    "- State minimum years as digits, for example \"5+ years\".",
    "- Use an empty string or empty list when the text says nothing.",
    "",
    `Job description:\n${jobDescription}`,
  ].join("\n");
}
