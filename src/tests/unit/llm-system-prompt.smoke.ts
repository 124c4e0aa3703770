import assert from "node:assert/strict";
import { LlmClient } from "../../ai/llm.client";
import { tryParseJsonObject } from "../../ai/llm.safe";
import { SCREENING_SYSTEM_PROMPT } from "../../ai/system/screening.system";
import { noopLogger } from "../helpers/fakes";

function main(): void {
  const client = new LlmClient("test-secret", noopLogger, "gpt-test");
  const payload = client.buildJsonRequestBody("{}", 123);

  assert.equal(payload.model, "gpt-test");
  assert.equal(payload.messages[0]?.role, "system");
  assert.equal(payload.messages[0]?.content, SCREENING_SYSTEM_PROMPT);
  assert.equal(payload.messages[1]?.role, "user");
  assert.equal(payload.max_tokens, 123);
  assert.equal(payload.max_completion_tokens, undefined);

  const reasoning = new LlmClient("test-secret", noopLogger, "o3-mini").buildJsonRequestBody("{}", 50);
  assert.equal(reasoning.max_completion_tokens, 50);
  assert.equal(reasoning.max_tokens, undefined);

  assert.deepEqual(tryParseJsonObject("```json\n{\"title\": \"QA\"}\n```"), { ok: true, data: { title: "QA" } });
  assert.deepEqual(tryParseJsonObject("[1, 2]"), { ok: false });
  assert.deepEqual(tryParseJsonObject("{broken"), { ok: false });

  process.stdout.write("OK, SCREENING_SYSTEM_PROMPT is attached to LLM payload.\n");
}

main();
