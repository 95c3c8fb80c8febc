import { readFile } from "node:fs/promises";
import path from "node:path";
import { parseAnalysisRequest } from "../src/analysis/analysis.schemas";
import { CandidateAnalysisService } from "../src/analysis/candidate-analysis.service";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { createScoringConfig } from "../src/scoring/scoring.config";

async function run(): Promise<void> {
  const [resumePath, jobPath] = process.argv.slice(2);
  if (!resumePath || !jobPath) {
    throw new Error("Usage: npm run score:pair -- <resume.txt> <job.txt>");
  }

  const env = loadEnv();
  // stdout carries the report, logs go to stderr.
  const logger = createLogger({
    minLevel: env.logLevel,
    write: (line) => {
      process.stderr.write(`${line}\n`);
    },
  });

  const [profileText, descriptionText] = await Promise.all([
    readFile(path.resolve(resumePath), "utf8"),
    readFile(path.resolve(jobPath), "utf8"),
  ]);

  const parsed = parseAnalysisRequest({
    candidate: { profileText },
    job: { descriptionText },
  });
  if (!parsed.ok) {
    throw new Error(parsed.error);
  }

  const service = new CandidateAnalysisService(
    logger,
    createScoringConfig({
      hireThreshold: env.hireThreshold,
      strongHireThreshold: env.strongHireThreshold,
    }),
  );
  const report = service.analyze(parsed.data, { context: { action: "score_pair" } });
  process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
}

run().catch((error) => {
  console.error("score-pair failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
