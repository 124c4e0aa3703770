import assert from "node:assert/strict";
import { AddressInfo } from "node:net";
import express from "express";
import fetch from "node-fetch";
import { StructuredJsonClient } from "../../ai/llm.client";
import { buildRankingsController, errorStatus } from "../../api/rankings.controller";
import { DEFAULT_COMPONENT_WEIGHTS } from "../../config/env";
import { CriteriaEvaluator } from "../../matching/criteria.evaluator";
import { RankingEngine } from "../../matching/ranking.engine";
import { MatchScorer } from "../../matching/scoring/match-scorer";
import { ProfileStandardizer } from "../../profiles/profile-standardizer.service";
import { CandidateAnalysisService } from "../../screening/candidate-analysis.service";
import { ScreeningService } from "../../screening/screening.service";
import { ConfigurationError, DocumentError, StandardizationError, ValidationError } from "../../shared/errors";
import { createSimilarityScorer, noopLogger } from "../helpers/fakes";

const JOB = {
  title: "Backend Engineer",
  requiredSkills: ["Python", "SQL"],
  experienceRequirement: "3+ years",
  educationRequirement: "BSc",
};

const llmMock: StructuredJsonClient = {
  async generateStructuredJson(prompt: string): Promise<string> {
    if (prompt.includes("Job description:")) {
      return JSON.stringify({ ...JOB, preferredSkills: [] });
    }
    if (prompt.includes("strengths and areas to improve")) {
      return JSON.stringify({ summary: "Solid backend fit.", strengths: ["Python"], improvementAreas: ["Kubernetes"] });
    }
    return JSON.stringify({ name: "Ana", skills: ["Python", "SQL"], experience: "4 years", education: "BSc" });
  },
};

function buildServer() {
  const similarityScorer = createSimilarityScorer({
    "Python, SQL": [1, 0],
    "Python": [0.6, 0.8],
  });
  const scorer = new MatchScorer(similarityScorer, new CriteriaEvaluator(similarityScorer, noopLogger), noopLogger);
  const rankingEngine = new RankingEngine(scorer, noopLogger, { weights: DEFAULT_COMPONENT_WEIGHTS });
  const app = express();
  app.use(express.json());
  app.use(
    "/rankings",
    buildRankingsController({
      rankingEngine,
      screeningService: new ScreeningService(new ProfileStandardizer(llmMock, noopLogger), rankingEngine, noopLogger),
      analysisService: new CandidateAnalysisService(llmMock, noopLogger),
      logger: noopLogger,
      defaultWeights: DEFAULT_COMPONENT_WEIGHTS,
      defaultTimeoutMs: 5000,
    }),
  );
  return app.listen(0, "127.0.0.1");
}

async function postJson(baseUrl: string, path: string, body: unknown): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
  return { status: response.status, body: await response.json() };
}

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null && key in value ? Reflect.get(value, key) : undefined;
}

async function testRankCandidates(baseUrl: string): Promise<void> {
  const { status, body } = await postJson(baseUrl, "/rankings", {
    job: JOB,
    candidates: [
      { name: "Ben", skills: ["Python"], experience: "5 years", education: "BSc" },
      { name: "Broken", skills: "Python", experience: "", education: "" },
      { name: "Ana", skills: ["Python", "SQL"], experience: "4 years", education: "BSc" },
    ],
    killerCriteria: { mandatorySkills: ["SQL"] },
  });

  assert.equal(status, 200);
  assert.equal(field(body, "ok"), true);
  assert.equal(field(body, "complete"), true);

  const ranking = field(body, "ranking");
  assert.ok(Array.isArray(ranking));
  assert.deepEqual(
    ranking.map((row: unknown) => [field(row, "rank"), field(row, "candidateName"), field(row, "inputIndex"), field(row, "status")]),
    [
      [1, "Ana", 2, "qualified"],
      [2, "Ben", 0, "disqualified"],
    ],
  );
  assert.equal(field(ranking[1], "disqualificationReasons"), "Missing mandatory skill: SQL");
  assert.equal(field(field(ranking[0], "componentScores"), "skills"), "100.0%");

  const failures = field(body, "failures");
  assert.ok(Array.isArray(failures));
  assert.deepEqual(failures.map((failure: unknown) => [field(failure, "inputIndex"), field(failure, "field")]), [
    [1, "skills"],
  ]);
}

async function testInvalidRequests(baseUrl: string): Promise<void> {
  const badJob = await postJson(baseUrl, "/rankings", { job: { ...JOB, title: "" }, candidates: [] });
  assert.equal(badJob.status, 400);
  assert.equal(field(badJob.body, "kind"), "ValidationError");
  assert.equal(field(badJob.body, "field"), "title");

  const badWeights = await postJson(baseUrl, "/rankings", { job: JOB, candidates: [], weights: { skills: -1 } });
  assert.equal(badWeights.status, 400);
  assert.equal(field(badWeights.body, "kind"), "ConfigurationError");
}

async function testRankFromText(baseUrl: string): Promise<void> {
  const { status, body } = await postJson(baseUrl, "/rankings/from-text", {
    jobDescription: "Backend engineer with Python and SQL",
    resumes: [{ id: "ana.txt", text: "Ana, Python and SQL" }, { id: "blank.txt", text: " " }],
  });

  assert.equal(status, 200);
  assert.equal(field(field(body, "job"), "title"), "Backend Engineer");
  const ranking = field(body, "ranking");
  assert.ok(Array.isArray(ranking));
  assert.equal(ranking.length, 1);
  assert.equal(field(ranking[0], "resumeId"), "ana.txt");
  assert.equal(field(ranking[0], "candidateName"), "Ana");
  assert.deepEqual(field(body, "failures"), [
    { resumeId: "blank.txt", kind: "StandardizationError", message: "Résumé text is empty." },
  ]);
}

async function testAnalyzeCandidates(baseUrl: string): Promise<void> {
  const { status, body } = await postJson(baseUrl, "/rankings/analysis", {
    job: JOB,
    candidates: [{ name: "Ana", skills: ["Python", "SQL"], experience: "4 years", education: "BSc" }],
  });

  assert.equal(status, 200);
  assert.deepEqual(body, {
    ok: true,
    analyses: [
      {
        candidateName: "Ana",
        ok: true,
        summary: "Solid backend fit.",
        strengths: ["Python"],
        improvementAreas: ["Kubernetes"],
      },
    ],
    cancelled: [],
    complete: true,
  });

  const empty = await postJson(baseUrl, "/rankings/analysis", { candidates: [] });
  assert.equal(empty.status, 400);
  assert.equal(field(empty.body, "field"), "candidates");
}

function testErrorStatus(): void {
  assert.equal(errorStatus(new ValidationError("job", "bad")), 400);
  assert.equal(errorStatus(new ConfigurationError("bad")), 400);
  assert.equal(errorStatus(new DocumentError("bad")), 400);
  assert.equal(errorStatus(new StandardizationError("timeout", "slow")), 502);
  assert.equal(errorStatus(new Error("boom")), 500);
}

async function run(): Promise<void> {
  const server = buildServer();
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address: AddressInfo | string | null = server.address();
  assert.ok(address !== null && typeof address === "object");
  const baseUrl = `http://127.0.0.1:${address.port}`;

  try {
    await testRankCandidates(baseUrl);
    await testInvalidRequests(baseUrl);
    await testRankFromText(baseUrl);
    await testAnalyzeCandidates(baseUrl);
    testErrorStatus();
  } finally {
    server.close();
  }
  process.stdout.write("Rankings API integration tests passed.\n");
}

void run();
