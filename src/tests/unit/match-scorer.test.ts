import assert from "node:assert/strict";
import { DEFAULT_COMPONENT_WEIGHTS } from "../../config/env";
import { CriteriaEvaluator } from "../../matching/criteria.evaluator";
import { MatchScorer, combineComponentScores } from "../../matching/scoring/match-scorer";
import { ConfigurationError, ValidationError } from "../../shared/errors";
import { MATCH_COMPONENTS } from "../../shared/types/matching.types";
import { approxEqual, buildCandidate, buildJob, createSimilarityScorer, noopLogger } from "../helpers/fakes";

const EMBEDDED_TEXTS: Record<string, number[]> = {
  "Python, NLP": [1, 0],
  "Python, NLP, PyTorch": [3, 4],
  "3+ years in machine learning": [0, 1],
  "4 years building NLP models": [0, 1],
  PyTorch: [4, 3],
};

// Every embedding call fails, so each component is scored by token overlap:
// skills 2/3, experience 1/9, education 2/5.
const similarityScorer = createSimilarityScorer();
const scorer = new MatchScorer(similarityScorer, new CriteriaEvaluator(similarityScorer, noopLogger), noopLogger);
const OVERLAP_MEAN = (2 / 3 + 1 / 9 + 0.4) / 3;

async function testPythonNlpScenario(): Promise<void> {
  const score = await scorer.score({
    job: buildJob(),
    candidate: buildCandidate(),
    weights: DEFAULT_COMPONENT_WEIGHTS,
  });

  assert.equal(score.disqualified, false);
  assert.ok(score.finalScore > 0 && score.finalScore <= 1);
  assert.equal(score.componentScores.skills, 2 / 3);
  assert.equal(score.componentScores.experience, 1 / 9);
  assert.equal(score.componentScores.education, 0.4);
  assert.ok(approxEqual(score.finalScore, OVERLAP_MEAN));
  assert.equal(score.debugInfo.components.skills.method, "token_overlap");
  assert.equal(score.debugInfo.components.skills.degradedKind, "ProviderUnavailable");
  assert.equal(Object.isFrozen(score), true);

  const skillHeavy = await scorer.score({
    job: buildJob(),
    candidate: buildCandidate(),
    weights: { skills: 0.4, experience: 0.3, education: 0.2, recruiterPreferences: 0.1 },
  });
  assert.equal(skillHeavy.disqualified, false);
  assert.ok(approxEqual(skillHeavy.finalScore, (0.4 * (2 / 3) + 0.3 * (1 / 9) + 0.2 * 0.4) / 0.9));
}

async function testOmittedPreferencesAreNeutral(): Promise<void> {
  const score = await scorer.score({
    job: buildJob(),
    candidate: buildCandidate(),
    weights: DEFAULT_COMPONENT_WEIGHTS,
  });

  assert.equal(score.componentScores.recruiterPreferences, 1);
  assert.equal(score.debugInfo.components.recruiterPreferences.method, "neutral");
  assert.deepEqual(score.debugInfo.neutralComponents, ["recruiterPreferences"]);
  assert.equal(score.debugInfo.preferenceSource, "none");
  assert.equal(score.debugInfo.weightsUsed.recruiterPreferences, 0);
  assert.ok(approxEqual(score.debugInfo.weightsUsed.skills, 1 / 3));
}

async function testPreferenceSources(): Promise<void> {
  const fromRecruiter = await scorer.score({
    job: buildJob({ preferredSkills: ["Docker"] }),
    candidate: buildCandidate(),
    weights: DEFAULT_COMPONENT_WEIGHTS,
    recruiterPreferences: { preferredSkills: ["PyTorch"] },
  });
  assert.equal(fromRecruiter.debugInfo.preferenceSource, "recruiter");
  assert.equal(fromRecruiter.componentScores.recruiterPreferences, 1 / 3);
  assert.deepEqual(fromRecruiter.debugInfo.neutralComponents, []);
  assert.ok(approxEqual(fromRecruiter.finalScore, 0.3 * (2 / 3) + 0.3 * (1 / 9) + 0.3 * 0.4 + 0.1 * (1 / 3)));

  const fromJob = await scorer.score({
    job: buildJob({ preferredSkills: ["Docker"] }),
    candidate: buildCandidate(),
    weights: DEFAULT_COMPONENT_WEIGHTS,
    recruiterPreferences: { preferredSkills: [] },
  });
  assert.equal(fromJob.debugInfo.preferenceSource, "job");
  assert.equal(fromJob.componentScores.recruiterPreferences, 0);
}

async function testZeroWeightsFallBackToMean(): Promise<void> {
  const score = await scorer.score({
    job: buildJob(),
    candidate: buildCandidate(),
    weights: { skills: 0, experience: 0, education: 0, recruiterPreferences: 0 },
  });
  assert.equal(score.debugInfo.weightingMode, "unweighted_mean");
  assert.ok(approxEqual(score.finalScore, OVERLAP_MEAN));
  assert.equal(score.debugInfo.weightsUsed.recruiterPreferences, 0);
  assert.equal(score.debugInfo.weightsUsed.education, 1 / 3);
}

async function testScoringIsIdempotent(): Promise<void> {
  const input = {
    job: buildJob(),
    candidate: buildCandidate(),
    weights: DEFAULT_COMPONENT_WEIGHTS,
    recruiterPreferences: { preferredSkills: ["PyTorch"] },
  };
  assert.deepEqual(await scorer.score(input), await scorer.score(input));
}

async function testDisqualifiedKeepsComponents(): Promise<void> {
  const score = await scorer.score({
    job: buildJob(),
    candidate: buildCandidate(),
    weights: DEFAULT_COMPONENT_WEIGHTS,
    killerCriteria: { mandatorySkills: ["Java"] },
  });
  assert.equal(score.disqualified, true);
  assert.equal(score.finalScore, 0);
  assert.deepEqual(score.disqualificationReasons, ["Missing mandatory skill: Java"]);
  assert.equal(score.componentScores.skills, 2 / 3);
}

async function testInvalidInputs(): Promise<void> {
  await assert.rejects(
    scorer.score({
      job: buildJob(),
      candidate: buildCandidate(),
      weights: { ...DEFAULT_COMPONENT_WEIGHTS, skills: -0.1 },
    }),
    ConfigurationError,
  );
  await assert.rejects(
    scorer.score({
      job: buildJob(),
      candidate: buildCandidate(),
      weights: { ...DEFAULT_COMPONENT_WEIGHTS, education: Number.NaN },
    }),
    ConfigurationError,
  );
  await assert.rejects(
    scorer.score({ job: buildJob(), candidate: buildCandidate({ name: " " }), weights: DEFAULT_COMPONENT_WEIGHTS }),
    (error: unknown) => error instanceof ValidationError && error.field === "name",
  );
  await assert.rejects(
    scorer.score({ job: buildJob({ title: "" }), candidate: buildCandidate(), weights: DEFAULT_COMPONENT_WEIGHTS }),
    (error: unknown) => error instanceof ValidationError && error.field === "title",
  );
}

async function testEmbeddingComponents(): Promise<void> {
  // Education has no vector and degrades to token overlap (0.4); the rest use cosine.
  const embeddingScorer = createSimilarityScorer(EMBEDDED_TEXTS);
  const embeddingMatcher = new MatchScorer(
    embeddingScorer,
    new CriteriaEvaluator(embeddingScorer, noopLogger),
    noopLogger,
  );

  const score = await embeddingMatcher.score({
    job: buildJob(),
    candidate: buildCandidate(),
    weights: DEFAULT_COMPONENT_WEIGHTS,
  });
  assert.equal(score.componentScores.skills, 0.6);
  assert.equal(score.componentScores.experience, 1);
  assert.equal(score.componentScores.education, 0.4);
  assert.equal(score.debugInfo.components.skills.method, "embedding");
  assert.equal(score.debugInfo.components.skills.degradedKind, undefined);
  assert.equal(score.debugInfo.components.experience.method, "embedding");
  assert.equal(score.debugInfo.components.education.method, "token_overlap");
  assert.equal(score.debugInfo.components.education.degradedKind, "ProviderUnavailable");
  assert.ok(approxEqual(score.finalScore, (0.3 * 0.6 + 0.3 * 1 + 0.3 * 0.4) / 0.9));

  const withPreferences = await embeddingMatcher.score({
    job: buildJob(),
    candidate: buildCandidate(),
    weights: DEFAULT_COMPONENT_WEIGHTS,
    recruiterPreferences: { preferredSkills: ["PyTorch"] },
  });
  assert.equal(withPreferences.componentScores.recruiterPreferences, 0.96);
  assert.equal(withPreferences.debugInfo.components.recruiterPreferences.method, "embedding");
  assert.ok(approxEqual(withPreferences.finalScore, 0.3 * 0.6 + 0.3 * 1 + 0.3 * 0.4 + 0.1 * 0.96));
}

async function testFinalScoreStaysInUnitRange(): Promise<void> {
  const embeddingScorer = createSimilarityScorer(EMBEDDED_TEXTS);
  const embeddingMatcher = new MatchScorer(
    embeddingScorer,
    new CriteriaEvaluator(embeddingScorer, noopLogger),
    noopLogger,
  );
  const weightSets = [
    { skills: 1, experience: 0, education: 0, recruiterPreferences: 0 },
    { skills: 0, experience: 0, education: 0, recruiterPreferences: 1 },
    { skills: 1e9, experience: 1e-9, education: 0, recruiterPreferences: 0 },
    { skills: 0, experience: 0, education: 0.000001, recruiterPreferences: 0 },
    { skills: 5, experience: 3, education: 2, recruiterPreferences: 1 },
    { skills: 0.25, experience: 0.25, education: 0.25, recruiterPreferences: 0.25 },
  ];

  for (const weights of weightSets) {
    for (const recruiterPreferences of [undefined, { preferredSkills: ["PyTorch"] }]) {
      const score = await embeddingMatcher.score({
        job: buildJob(),
        candidate: buildCandidate(),
        weights,
        recruiterPreferences,
      });
      assert.ok(
        score.finalScore >= 0 && score.finalScore <= 1,
        `finalScore ${score.finalScore} out of range for ${JSON.stringify(weights)}`,
      );
    }
  }
}

function testCombineComponentScores(): void {
  const scores = { skills: 1, experience: 0.5, education: 0, recruiterPreferences: 1 };
  const weights = { skills: 0.5, experience: 0.5, education: 0, recruiterPreferences: 1 };

  assert.equal(combineComponentScores(scores, weights, []).finalScore, 0.875);
  assert.equal(combineComponentScores(scores, weights, ["recruiterPreferences"]).finalScore, 0.75);
  assert.throws(() => combineComponentScores(scores, weights, MATCH_COMPONENTS), ConfigurationError);
}

async function run(): Promise<void> {
  await testPythonNlpScenario();
  await testOmittedPreferencesAreNeutral();
  await testPreferenceSources();
  await testZeroWeightsFallBackToMean();
  await testScoringIsIdempotent();
  await testDisqualifiedKeepsComponents();
  await testInvalidInputs();
  await testEmbeddingComponents();
  await testFinalScoreStaysInUnitRange();
  testCombineComponentScores();
  process.stdout.write("match-scorer tests passed.\n");
}

void run();
