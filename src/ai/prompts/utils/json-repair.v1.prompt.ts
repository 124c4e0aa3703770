const MAX_RAW_CHARS = 8000;

export const JSON_REPAIR_V1_PROMPT = [
  "Task: a profile extraction step returned text that is not a valid JSON object. Repair it.",
  "",
  "Rules:",
  "- Return exactly one JSON object, nothing else.",
  "- Keep every key and value the broken text already has; fix only syntax.",
  "- Follow the expected shape below. Missing text fields become \"\", missing lists become [].",
  "- No markdown fences, no commentary.",
].join("\n");

export function buildJsonRepairV1Prompt(input: { schemaHint: string; raw: string }): string {
  return [
    JSON_REPAIR_V1_PROMPT,
    "",
    `Expected shape: ${input.schemaHint}`,
    "",
    "Broken output:",
    input.raw.slice(0, MAX_RAW_CHARS),
  ].join("\n");
}
