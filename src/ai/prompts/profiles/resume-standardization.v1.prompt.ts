export const RESUME_STANDARDIZATION_SCHEMA_HINT =
  "Object with name (string), skills (string[]), experience (string), education (string).";

export function buildResumeStandardizationV1Prompt(resumeText: string): string {
  return [
    "Task: extract a standardized candidate profile from the résumé below.",
    "Return STRICT JSON only.",
    "",
    "Output schema:",
    "{",
    '  "name": "candidate full name",',
    '  "skills": ["skill1", "skill2"],',
    '  "experience": "total years of experience, industries, domain knowledge and past roles",',
    '  "education": "highest education level, other education, certifications"',
    "}",
    "",
    "Rules:",
    "- Start experience with the total years of professional experience as digits, for example \"7 years\".",
    "- skills lists each skill once.",
    "- Use an empty string or empty list when the résumé says nothing.",
    "",
    `Résumé:\n${resumeText}`,
  ].join("\n");
}
