import assert from "node:assert/strict";
import { test } from "node:test";
import { parseAnalysisRequest } from "../../analysis/analysis.schemas";
import { CandidateAnalysisService } from "../../analysis/candidate-analysis.service";
import { createLogger } from "../../config/logger";
import { AnalysisRequest } from "../../shared/types/analysis.types";

const NOW = new Date("2024-06-01T00:00:00Z");

const PROFILE =
  "Senior backend engineer. Python, Django and PostgreSQL on AWS with Docker. " +
  "2015-2019 at a fintech, 2019-present as lead engineer.";
const JOB =
  "We need a Python engineer with Django, PostgreSQL, Redis and Kubernetes. " +
  "Bachelor degree in computer science required.";

interface LoggedEntry {
  level: string;
  message: string;
  meta: Record<string, unknown>;
}

function createCapturingService(): { service: CandidateAnalysisService; entries: LoggedEntry[] } {
  const entries: LoggedEntry[] = [];
  const logger = createLogger({
    minLevel: "debug",
    write: (line) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed !== "object" || parsed === null) {
        return;
      }
      const level = "level" in parsed && typeof parsed.level === "string" ? parsed.level : "";
      const message = "message" in parsed && typeof parsed.message === "string" ? parsed.message : "";
      const meta: Record<string, unknown> = {};
      if ("meta" in parsed && typeof parsed.meta === "object" && parsed.meta !== null) {
        Object.assign(meta, parsed.meta);
      }
      entries.push({ level, message, meta });
    },
  });
  return { service: new CandidateAnalysisService(logger), entries };
}

function buildRequest(candidate: Record<string, unknown> = {}): AnalysisRequest {
  const parsed = parseAnalysisRequest({
    candidate: { profileText: PROFILE, ...candidate },
    job: { descriptionText: JOB },
  });
  if (!parsed.ok) {
    throw new Error(parsed.error);
  }
  return parsed.data;
}

test("analyzes a candidate end to end", () => {
  const { service, entries } = createCapturingService();
  const report = service.analyze(buildRequest(), { now: NOW });

  assert.deepEqual(report.candidateSkills, {
    programming_languages: ["python"],
    web_technologies: ["django"],
    databases: ["postgresql"],
    cloud_platforms: ["aws", "docker"],
  });
  assert.deepEqual(report.jobSkills, {
    programming_languages: ["python"],
    web_technologies: ["django"],
    databases: ["postgresql", "redis"],
    cloud_platforms: ["kubernetes"],
  });

  assert.equal(report.match.overallScore, 60);
  assert.equal(report.match.totalRequired, 5);
  assert.equal(report.match.totalMatched, 3);
  assert.deepEqual(report.match.missingSkills, {
    programming_languages: [],
    web_technologies: [],
    databases: ["redis"],
    cloud_platforms: ["kubernetes"],
  });

  assert.equal(report.scoring.skills.totalScore, 60);
  assert.equal(report.scoring.experience.details.detectedYears, 9);
  assert.equal(report.scoring.experience.yearsOfExperience, 90);
  assert.equal(report.scoring.experience.totalScore, 78);
  assert.equal(report.scoring.education.degreeMatch, 30);
  assert.equal(report.scoring.education.fieldRelevance, 50);
  assert.equal(report.scoring.education.certifications, 20);
  assert.equal(report.scoring.education.totalScore, 36);

  const overall = report.scoring.overall;
  assert.equal(overall.componentScores.achievements, 50);
  assert.equal(overall.overallScore, 54.8);
  assert.equal(overall.recommendation.decision, "Maybe");
  assert.equal(overall.recommendation.confidence, "Medium");
  assert.deepEqual(overall.riskFactors, ["Educational background concerns"]);
  assert.deepEqual(overall.strengths, []);
  assert.equal(overall.decisionConfidence, "Medium");

  assert.deepEqual(report.recommendations, {
    databases: ["Develop databases skills through relevant courses and practice"],
    cloud_platforms: [
      "Obtain cloud certifications (AWS, Azure, GCP)",
      "Practice with free tier cloud services",
      "Deploy personal projects to cloud platforms",
    ],
  });
  assert.equal(report.skillDepth.python, "expert");
  assert.equal(report.skillDepth.django, "expert");
  assert.equal(report.skillDepth.postgresql, "expert");
  assert.equal(report.skillDepth.aws, "mentioned");
  assert.equal(report.analyzedAt, "2024-06-01T00:00:00.000Z");

  const completed = entries.find((entry) => entry.message === "Candidate analysis completed");
  assert.ok(completed);
  assert.equal(completed.level, "info");
  assert.equal(completed.meta.action, "analyze_candidate");
  assert.equal(completed.meta.overall_score, 54.8);
  assert.equal(completed.meta.decision, "Maybe");
  assert.equal(completed.meta.ok, true);
  assert.equal(completed.meta.total_required, 5);
  assert.equal(completed.meta.total_matched, 3);
  assert.equal(entries.some((entry) => entry.level === "warn"), false);
});

test("structured skill lists are merged with extracted skills", () => {
  const { service } = createCapturingService();
  const report = service.analyze(buildRequest({ skills: ["Redis", "k8s"] }), { now: NOW });

  assert.deepEqual(report.candidateSkills.databases, ["postgresql", "redis"]);
  assert.deepEqual(report.candidateSkills.cloud_platforms, ["aws", "docker", "kubernetes"]);
  assert.equal(report.match.overallScore, 100);
  assert.deepEqual(report.recommendations, {});
});

test("a failing component degrades instead of aborting the analysis", () => {
  const { service, entries } = createCapturingService();
  const request: AnalysisRequest = { ...buildRequest(), experienceAnalysis: { roleRelevance: 250 } };
  const report = service.analyze(request, { now: NOW, context: { request_id: "req-7" } });

  assert.equal(report.scoring.experience.error, "Experience scoring error: roleRelevance must be between 0 and 100");
  assert.equal(report.scoring.experience.totalScore, 0);
  assert.equal(report.scoring.skills.totalScore, 60);
  assert.equal(report.scoring.overall.error, undefined);

  const degraded = entries.find((entry) => entry.message === "Scoring component degraded");
  assert.ok(degraded);
  assert.equal(degraded.level, "warn");
  assert.equal(degraded.meta.component, "experience");
  assert.equal(degraded.meta.request_id, "req-7");
  assert.equal(degraded.meta.error_code, "scoring_failed");
});

test("exposes extraction and matching directly", () => {
  const { service } = createCapturingService();
  assert.deepEqual(service.extractSkills("TypeScript and k8s"), {
    programming_languages: ["typescript"],
    cloud_platforms: ["kubernetes"],
  });
  const match = service.matchSkills({ databases: ["redis"] }, { databases: ["redis", "mysql"] });
  assert.equal(match.overallScore, 50);
  assert.deepEqual(service.getConfig(), { hireThreshold: 70, strongHireThreshold: 85 });
});
