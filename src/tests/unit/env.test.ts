import assert from "node:assert/strict";
import { DEFAULT_COMPONENT_WEIGHTS, loadEnv, parseSoftMatchThreshold, parseWeights } from "../../config/env";

const ENV_KEYS = [
  "NODE_ENV",
  "PORT",
  "LOG_LEVEL",
  "OPENAI_API_KEY",
  "OPENAI_CHAT_MODEL",
  "OPENAI_EMBEDDINGS_MODEL",
  "OPENAI_EMBEDDING_MODEL",
  "EMBEDDING_TIMEOUT_MS",
  "EMBEDDING_CACHE_SIZE",
  "RANKING_CONCURRENCY",
  "RANKING_TIMEOUT_MS",
  "KILLER_SOFT_MATCH_THRESHOLD",
  "DEFAULT_WEIGHTS",
];

function withEnv(values: Record<string, string>, check: () => void): void {
  const saved = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));
  for (const key of ENV_KEYS) {
    delete process.env[key];
  }
  Object.assign(process.env, values);
  try {
    check();
  } finally {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

function testLoadEnvDefaults(): void {
  withEnv({ OPENAI_API_KEY: " test-secret " }, () => {
    const env = loadEnv();
    assert.equal(env.port, 3000);
    assert.equal(env.logLevel, "info");
    assert.equal(env.openaiApiKey, "test-secret");
    assert.equal(env.openaiChatModel, "gpt-4o-mini");
    assert.equal(env.openaiEmbeddingModel, "text-embedding-3-small");
    assert.equal(env.rankingConcurrency, 4);
    assert.equal(env.rankingTimeoutMs, 120000);
    assert.equal(env.embeddingCacheSize, 2000);
    assert.equal(env.killerSoftMatchThreshold, 0.85);
    assert.equal(env.defaultWeights, DEFAULT_COMPONENT_WEIGHTS);
  });
}

function testLoadEnvOverrides(): void {
  withEnv(
    {
      OPENAI_API_KEY: "test-secret",
      PORT: "8080",
      LOG_LEVEL: "DEBUG",
      RANKING_CONCURRENCY: "8",
      KILLER_SOFT_MATCH_THRESHOLD: "off",
      DEFAULT_WEIGHTS: "skills=0.5",
    },
    () => {
      const env = loadEnv();
      assert.equal(env.port, 8080);
      assert.equal(env.logLevel, "debug");
      assert.equal(env.rankingConcurrency, 8);
      assert.equal(env.killerSoftMatchThreshold, undefined);
      assert.equal(env.defaultWeights.skills, 0.5);
    },
  );
}

function testLoadEnvRejectsInvalidValues(): void {
  withEnv({}, () => {
    assert.throws(() => loadEnv(), /Missing required environment variable: OPENAI_API_KEY/);
  });
  withEnv({ OPENAI_API_KEY: "test-secret", RANKING_CONCURRENCY: "0" }, () => {
    assert.throws(() => loadEnv(), /Invalid RANKING_CONCURRENCY value: 0/);
  });
  withEnv({ OPENAI_API_KEY: "test-secret", LOG_LEVEL: "verbose" }, () => {
    assert.throws(() => loadEnv(), /Invalid LOG_LEVEL value: verbose/);
  });
}

function testParsers(): void {
  assert.equal(parseSoftMatchThreshold("off"), undefined);
  assert.equal(parseSoftMatchThreshold(" NONE "), undefined);
  assert.equal(parseSoftMatchThreshold("0.9"), 0.9);
  assert.throws(() => parseSoftMatchThreshold("2"), /KILLER_SOFT_MATCH_THRESHOLD/);
  assert.throws(() => parseSoftMatchThreshold("0"), /KILLER_SOFT_MATCH_THRESHOLD/);

  assert.equal(parseWeights(undefined), DEFAULT_COMPONENT_WEIGHTS);
  assert.deepEqual(parseWeights("skills=0.5, preferences=0"), {
    skills: 0.5,
    experience: 0.3,
    education: 0.3,
    recruiterPreferences: 0,
  });
  assert.deepEqual(parseWeights("recruiter_preferences=0.2"), {
    ...DEFAULT_COMPONENT_WEIGHTS,
    recruiterPreferences: 0.2,
  });
  assert.throws(() => parseWeights("skills=-1"), /Invalid DEFAULT_WEIGHTS entry: skills=-1/);
  assert.throws(() => parseWeights("salary=1"), /Invalid DEFAULT_WEIGHTS component: salary/);
}

function run(): void {
  testLoadEnvDefaults();
  testLoadEnvOverrides();
  testLoadEnvRejectsInvalidValues();
  testParsers();
  process.stdout.write("env tests passed.\n");
}

run();
