import { randomUUID } from "node:crypto";
import express, { Express, NextFunction, Request, Response } from "express";
import { AnalysisController, ControllerResponse } from "./analysis/analysis.controller";
import { CandidateAnalysisService } from "./analysis/candidate-analysis.service";
import { EnvConfig } from "./config/env";
import { createLogger, Logger, LoggerContext, logContext } from "./config/logger";
import { createScoringConfig } from "./scoring/scoring.config";

export interface CreatedApp {
  app: Express;
  logger: Logger;
  service: CandidateAnalysisService;
}

export function createApp(env: EnvConfig, logger: Logger = createLogger({ minLevel: env.logLevel })): CreatedApp {
  const app = express();
  app.use(express.json({ limit: env.jsonBodyLimit }));

  const service = new CandidateAnalysisService(
    logger,
    createScoringConfig({
      hireThreshold: env.hireThreshold,
      strongHireThreshold: env.strongHireThreshold,
    }),
  );
  const controller = new AnalysisController(service, logger);

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.post("/api/skills/extract", (request: Request, response: Response) => {
    send(response, controller.handleExtract(request.body, buildContext(request, "/api/skills/extract")));
  });

  app.post("/api/skills/match", (request: Request, response: Response) => {
    send(response, controller.handleMatch(request.body, buildContext(request, "/api/skills/match")));
  });

  app.post("/api/analysis", (request: Request, response: Response) => {
    send(response, controller.handleAnalysis(request.body, buildContext(request, "/api/analysis")));
  });

  // Body parser failures (malformed JSON, oversized payloads) end up here.
  app.use((error: unknown, request: Request, response: Response, _next: NextFunction) => {
    const status = readHttpStatus(error);
    logContext(logger, status >= 500 ? "error" : "warn", "Request failed before reaching a handler", {
      ...buildContext(request, request.path),
      ok: false,
      error_code: status >= 500 ? "internal_error" : "invalid_request",
    }, {
      error: error instanceof Error ? error.message : "Unknown error",
    });
    response.status(status).json({ ok: false, error: status >= 500 ? "Internal error" : "Malformed request body" });
  });

  return { app, logger, service };
}

function send(response: Response, result: ControllerResponse): void {
  response.status(result.status).json(result.body);
}

function buildContext(request: Request, route: string): LoggerContext {
  return {
    request_id: request.header("x-request-id") ?? randomUUID(),
    route,
  };
}

function readHttpStatus(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    if (typeof status === "number" && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}
