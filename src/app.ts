import express, { Express, NextFunction, Request, Response } from "express";
import { EmbeddingsClient } from "./ai/embeddings.client";
import { LlmClient } from "./ai/llm.client";
import { buildRankingsController } from "./api/rankings.controller";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { DocumentService } from "./documents/document.service";
import { CriteriaEvaluator } from "./matching/criteria.evaluator";
import { CachedEmbeddingProvider } from "./matching/embedding-cache";
import { RankingEngine } from "./matching/ranking.engine";
import { MatchScorer } from "./matching/scoring/match-scorer";
import { SimilarityScorer } from "./matching/similarity.scorer";
import { ProfileStandardizer } from "./profiles/profile-standardizer.service";
import { CandidateAnalysisService } from "./screening/candidate-analysis.service";
import { ScreeningService } from "./screening/screening.service";

export interface ScreeningContainer {
  logger: Logger;
  documentService: DocumentService;
  rankingEngine: RankingEngine;
  screeningService: ScreeningService;
  analysisService: CandidateAnalysisService;
}

export interface AppContext extends ScreeningContainer {
  app: Express;
}

export function createScreeningContainer(env: EnvConfig, logger?: Logger): ScreeningContainer {
  const resolvedLogger = logger ?? createLogger({ minLevel: env.logLevel });

  const embeddingsClient = new EmbeddingsClient(
    env.openaiApiKey,
    env.openaiEmbeddingModel,
    env.embeddingTimeoutMs,
  );
  const embeddingProvider = new CachedEmbeddingProvider(embeddingsClient, env.embeddingCacheSize);
  const similarityScorer = new SimilarityScorer(embeddingProvider, resolvedLogger);
  const criteriaEvaluator = new CriteriaEvaluator(similarityScorer, resolvedLogger, {
    softMatchThreshold: env.killerSoftMatchThreshold,
  });
  const matchScorer = new MatchScorer(similarityScorer, criteriaEvaluator, resolvedLogger);
  const rankingEngine = new RankingEngine(matchScorer, resolvedLogger, {
    weights: env.defaultWeights,
    concurrency: env.rankingConcurrency,
  });
  const llmClient = new LlmClient(env.openaiApiKey, resolvedLogger, env.openaiChatModel);
  const standardizer = new ProfileStandardizer(llmClient, resolvedLogger);

  resolvedLogger.info("Screening services configured", {
    embeddingModel: embeddingsClient.getModelName(),
    chatModel: llmClient.getModelName(),
    concurrency: env.rankingConcurrency,
    embeddingCacheSize: env.embeddingCacheSize,
    killerSoftMatchThreshold: env.killerSoftMatchThreshold ?? "off",
  });

  return {
    logger: resolvedLogger,
    documentService: new DocumentService(resolvedLogger),
    rankingEngine,
    screeningService: new ScreeningService(standardizer, rankingEngine, resolvedLogger, {
      concurrency: env.rankingConcurrency,
    }),
    analysisService: new CandidateAnalysisService(llmClient, resolvedLogger, {
      concurrency: env.rankingConcurrency,
    }),
  };
}

export function createApp(env: EnvConfig): AppContext {
  const container = createScreeningContainer(env);
  const app = express();

  app.use(express.json({ limit: "5mb" }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use(
    "/rankings",
    buildRankingsController({
      rankingEngine: container.rankingEngine,
      screeningService: container.screeningService,
      analysisService: container.analysisService,
      logger: container.logger,
      defaultWeights: env.defaultWeights,
      defaultTimeoutMs: env.rankingTimeoutMs,
    }),
  );

  // Malformed JSON bodies surface here from express.json().
  app.use((error: unknown, _request: Request, response: Response, next: NextFunction) => {
    if (response.headersSent) {
      next(error);
      return;
    }
    container.logger.warn("Request body rejected", {
      error: error instanceof Error ? error.message : "Unknown error",
    });
    response.status(400).json({ ok: false, kind: "ValidationError", error: "Invalid JSON body" });
  });

  return { app, ...container };
}
