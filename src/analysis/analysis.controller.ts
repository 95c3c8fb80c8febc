import { Logger, LoggerContext, logContext } from "../config/logger";
import { parseAnalysisRequest, parseExtractRequest, parseMatchRequest } from "./analysis.schemas";
import { CandidateAnalysisService } from "./candidate-analysis.service";

export interface ControllerResponse {
  status: number;
  body: Record<string, unknown>;
}

/**
 * Transport-independent request handlers. Express routes in app.ts only pass
 * the parsed JSON body in and write the returned status and body out.
 */
export class AnalysisController {
  constructor(
    private readonly service: CandidateAnalysisService,
    private readonly logger: Logger,
  ) {}

  handleExtract(body: unknown, context: LoggerContext = {}): ControllerResponse {
    const parsed = parseExtractRequest(body);
    if (!parsed.ok) {
      return this.rejectInvalid(parsed.error, context);
    }
    return this.run(context, () => ({
      ok: true,
      skills: this.service.extractSkills(parsed.data.text),
    }));
  }

  handleMatch(body: unknown, context: LoggerContext = {}): ControllerResponse {
    const parsed = parseMatchRequest(body);
    if (!parsed.ok) {
      return this.rejectInvalid(parsed.error, context);
    }
    return this.run(context, () => ({
      ok: true,
      match: this.service.matchSkills(parsed.data.candidate, parsed.data.required),
    }));
  }

  handleAnalysis(body: unknown, context: LoggerContext = {}): ControllerResponse {
    const parsed = parseAnalysisRequest(body);
    if (!parsed.ok) {
      return this.rejectInvalid(parsed.error, context);
    }
    return this.run(context, () => ({
      ok: true,
      report: this.service.analyze(parsed.data, { context }),
    }));
  }

  private run(context: LoggerContext, handler: () => Record<string, unknown>): ControllerResponse {
    try {
      return { status: 200, body: handler() };
    } catch (error) {
      logContext(this.logger, "error", "Analysis request failed", { ...context, ok: false, error_code: "internal_error" }, {
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return { status: 500, body: { ok: false, error: "Internal error" } };
    }
  }

  private rejectInvalid(error: string, context: LoggerContext): ControllerResponse {
    logContext(this.logger, "warn", "Rejected invalid request body", { ...context, ok: false, error_code: "invalid_request" }, {
      error,
    });
    return { status: 400, body: { ok: false, error } };
  }
}
