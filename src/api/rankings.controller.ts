import { Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { buildReportRows } from "../matching/ranking-report";
import { RankingEngine } from "../matching/ranking.engine";
import { CandidateAnalysisService } from "../screening/candidate-analysis.service";
import { ScreeningService } from "../screening/screening.service";
import {
  ConfigurationError,
  DocumentError,
  StandardizationError,
  ValidationError,
  errorMessage,
} from "../shared/errors";
import { ComponentWeights, RankedCandidate, RankingOptions } from "../shared/types/matching.types";
import { parseAnalysisRequest, parseDocumentRequest, parseRankingRequest } from "./ranking-request";

interface RankingsControllerDeps {
  rankingEngine: RankingEngine;
  screeningService: ScreeningService;
  analysisService: CandidateAnalysisService;
  logger: Logger;
  defaultWeights: ComponentWeights;
  defaultTimeoutMs: number;
}

export function buildRankingsController(deps: RankingsControllerDeps): Router {
  const router = Router();

  router.post("/", async (request: Request, response: Response) => {
    try {
      const parsed = parseRankingRequest(request.body, deps.defaultWeights);
      const result = await deps.rankingEngine.rank(parsed.input, withDefaultTimeout(parsed.options, deps));
      const toRequestIndex = (index: number): number => parsed.requestIndexes[index] ?? index;
      const ranking = result.ranking.map((entry) => ({ ...entry, inputIndex: toRequestIndex(entry.inputIndex) }));

      response.status(200).json({
        ok: true,
        ranking: describeRanking(ranking),
        failures: [
          ...parsed.rejected,
          ...result.failures.map((failure) => ({ ...failure, inputIndex: toRequestIndex(failure.inputIndex) })),
        ].sort((left, right) => left.inputIndex - right.inputIndex),
        cancelled: result.cancelled.map(toRequestIndex),
        complete: result.complete,
      });
    } catch (error) {
      respondWithError(response, deps.logger, "/rankings", error);
    }
  });

  router.post("/from-text", async (request: Request, response: Response) => {
    try {
      const parsed = parseDocumentRequest(request.body, deps.defaultWeights);
      const result = await deps.screeningService.rankDocuments(parsed, withDefaultTimeout(parsed.options, deps));

      response.status(200).json({
        ok: true,
        job: result.job,
        ranking: describeRanking(result.ranking).map((row, position) => ({
          resumeId: result.ranking[position].resumeId,
          ...row,
        })),
        failures: result.failures,
        cancelled: result.cancelled,
        complete: result.complete,
      });
    } catch (error) {
      respondWithError(response, deps.logger, "/rankings/from-text", error);
    }
  });

  router.post("/analysis", async (request: Request, response: Response) => {
    try {
      const parsed = parseAnalysisRequest(request.body);
      const result = await deps.analysisService.analyzeCandidates(
        { candidates: parsed.candidates, job: parsed.job },
        withDefaultTimeout(parsed.options, deps),
      );

      response.status(200).json({ ok: true, ...result });
    } catch (error) {
      respondWithError(response, deps.logger, "/rankings/analysis", error);
    }
  });

  return router;
}

function describeRanking(ranking: ReadonlyArray<RankedCandidate>) {
  const rows = buildReportRows(ranking);
  return rows.map((row, position) => ({
    ...row,
    score: ranking[position].score,
  }));
}

function withDefaultTimeout(options: RankingOptions, deps: RankingsControllerDeps): RankingOptions {
  return {
    ...options,
    timeoutMs: options.timeoutMs ?? deps.defaultTimeoutMs,
  };
}

export function errorStatus(error: unknown): number {
  if (error instanceof ValidationError || error instanceof ConfigurationError || error instanceof DocumentError) {
    return 400;
  }
  if (error instanceof StandardizationError) {
    return 502;
  }
  return 500;
}

function respondWithError(response: Response, logger: Logger, route: string, error: unknown): void {
  const status = errorStatus(error);
  const kind =
    error instanceof ValidationError ||
    error instanceof ConfigurationError ||
    error instanceof DocumentError ||
    error instanceof StandardizationError
      ? error.kind
      : "InternalError";

  if (status >= 500) {
    logger.error("Ranking request failed", { route, kind, error: errorMessage(error) });
  } else {
    logger.info("Ranking request rejected", { route, kind, error: errorMessage(error) });
  }

  response.status(status).json({
    ok: false,
    kind,
    error: status === 500 ? "Internal error" : errorMessage(error),
    ...(error instanceof ValidationError ? { field: error.field } : {}),
  });
}
