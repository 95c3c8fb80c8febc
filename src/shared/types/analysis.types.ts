import {
  EducationScoreBreakdown,
  ExperienceScoreBreakdown,
  OverallResult,
  SkillsScoreBreakdown,
} from "./scoring.types";
import {
  CategorySkillMap,
  SkillDepthLevel,
  SkillMatchResult,
  SkillRecommendations,
} from "./skills.types";

/**
 * Fields an upstream analysis layer may have already judged. Absent values
 * fall back to the baseline constants used by the experience score.
 */
export interface ExperienceAnalysis {
  roleRelevance?: number;
  industryMatch?: number;
}

export interface CandidateInput {
  profileText: string;
  workHistory: string;
  education: string;
  achievements: string;
  skills: string[];
}

export interface JobInput {
  descriptionText: string;
  educationalRequirements: string;
  skills: string[];
}

export interface AnalysisRequest {
  candidate: CandidateInput;
  job: JobInput;
  experienceAnalysis?: ExperienceAnalysis;
}

export interface AnalysisScoring {
  skills: SkillsScoreBreakdown;
  experience: ExperienceScoreBreakdown;
  education: EducationScoreBreakdown;
  overall: OverallResult;
}

export interface AnalysisReport {
  candidateSkills: CategorySkillMap;
  jobSkills: CategorySkillMap;
  match: SkillMatchResult;
  recommendations: SkillRecommendations;
  skillDepth: Record<string, SkillDepthLevel>;
  scoring: AnalysisScoring;
  analyzedAt: string;
}
