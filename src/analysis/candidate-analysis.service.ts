import { Logger, LoggerContext, logContext } from "../config/logger";
import { scoreEducation } from "../scoring/education-score";
import { scoreExperience } from "../scoring/experience-score";
import { scoreOverall } from "../scoring/overall-score";
import { DEFAULT_SCORING_CONFIG } from "../scoring/scoring.config";
import { scoreSkills } from "../scoring/skills-score";
import { AnalysisReport, AnalysisRequest } from "../shared/types/analysis.types";
import { ScoringConfig } from "../shared/types/scoring.types";
import {
  CategorySkillMap,
  SKILL_CATEGORIES,
  SkillMatchResult,
} from "../shared/types/skills.types";
import { analyzeSkillDepth, getSkillRecommendations } from "../skills/skill-insights";
import { matchSkills } from "../skills/skill-match.calculator";
import { categorizeSkillNames, extractSkills, mergeSkillMaps } from "../skills/skill.extractor";
import { LoadedSkillTaxonomy, SKILL_TAXONOMY } from "../skills/skill-taxonomy";

export interface AnalyzeOptions {
  now?: Date;
  context?: LoggerContext;
}

export class CandidateAnalysisService {
  constructor(
    private readonly logger: Logger,
    private readonly config: ScoringConfig = DEFAULT_SCORING_CONFIG,
    private readonly taxonomy: LoadedSkillTaxonomy = SKILL_TAXONOMY,
  ) {}

  getConfig(): ScoringConfig {
    return this.config;
  }

  extractSkills(text: string): CategorySkillMap {
    return extractSkills(text, this.taxonomy);
  }

  matchSkills(candidate: CategorySkillMap, required: CategorySkillMap): SkillMatchResult {
    return matchSkills(candidate, required);
  }

  analyze(request: AnalysisRequest, options: AnalyzeOptions = {}): AnalysisReport {
    const startedAt = Date.now();
    const now = options.now ?? new Date();
    const context: LoggerContext = { action: "analyze_candidate", ...(options.context ?? {}) };

    const candidateSkills = mergeSkillMaps(
      extractSkills(request.candidate.profileText, this.taxonomy),
      categorizeSkillNames(request.candidate.skills, this.taxonomy),
      this.taxonomy,
    );
    const jobSkills = mergeSkillMaps(
      extractSkills(request.job.descriptionText, this.taxonomy),
      categorizeSkillNames(request.job.skills, this.taxonomy),
      this.taxonomy,
    );
    const match = matchSkills(candidateSkills, jobSkills);

    const skills = scoreSkills(match);
    const experience = scoreExperience(request.candidate.workHistory, request.experienceAnalysis, now);
    const education = scoreEducation(
      request.candidate.education,
      request.job.educationalRequirements,
      request.candidate.achievements,
    );
    const overall = scoreOverall(skills, experience, education, request.candidate.achievements, this.config);

    for (const [component, error] of [
      ["skills", skills.error],
      ["experience", experience.error],
      ["education", education.error],
      ["overall", overall.error],
    ] as const) {
      if (error) {
        logContext(this.logger, "warn", "Scoring component degraded", { ...context, error_code: "scoring_failed" }, {
          component,
          error,
        });
      }
    }

    logContext(
      this.logger,
      "info",
      "Candidate analysis completed",
      {
        ...context,
        latency_ms: Date.now() - startedAt,
        overall_score: overall.overallScore,
        decision: overall.recommendation.decision,
        ok: !overall.error,
      },
      {
        total_required: match.totalRequired,
        total_matched: match.totalMatched,
      },
    );

    return {
      candidateSkills,
      jobSkills,
      match,
      recommendations: getSkillRecommendations(match.missingSkills),
      skillDepth: analyzeSkillDepth(request.candidate.profileText, flattenSkills(candidateSkills)),
      scoring: {
        skills,
        experience,
        education,
        overall,
      },
      analyzedAt: now.toISOString(),
    };
  }
}

function flattenSkills(map: CategorySkillMap): string[] {
  return SKILL_CATEGORIES.flatMap((category) => map[category] ?? []);
}
