import {
  DecisionConfidence,
  OverallResult,
  Recommendation,
  ScoringConfig,
} from "../shared/types/scoring.types";
import { DEFAULT_SCORING_CONFIG } from "./scoring.config";
import { describeFailure, findKeywords, requirePercentage, requireText, round2 } from "./score-utils";

/**
 * Weights sum to 0.90. Cultural fit (0.10) is not scored and the remaining
 * weights are not renormalized, so the highest reachable overall score is 90.
 */
export const OVERALL_WEIGHTS = Object.freeze({
  skills: 0.35,
  experience: 0.3,
  education: 0.15,
  achievements: 0.1,
});

const ACHIEVEMENT_KEYWORDS = [
  "award",
  "recognition",
  "published",
  "patent",
  "led team",
  "increased",
  "improved",
  "reduced",
  "saved",
  "grew",
  "built",
];

export interface ScoredComponent {
  totalScore: number;
}

export function scoreOverall(
  skillsBreakdown: ScoredComponent,
  experienceBreakdown: ScoredComponent,
  educationBreakdown: ScoredComponent,
  achievementsText: string,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): OverallResult {
  try {
    const skills = requirePercentage(skillsBreakdown.totalScore, "skills.totalScore");
    const experience = requirePercentage(experienceBreakdown.totalScore, "experience.totalScore");
    const education = requirePercentage(educationBreakdown.totalScore, "education.totalScore");
    const achievements = scoreAchievements(requireText(achievementsText, "achievementsText"));

    // Classification and confidence use the unrounded score; only reported values are rounded.
    const rawScore =
      skills * OVERALL_WEIGHTS.skills +
      experience * OVERALL_WEIGHTS.experience +
      education * OVERALL_WEIGHTS.education +
      achievements * OVERALL_WEIGHTS.achievements;

    return {
      overallScore: round2(rawScore),
      componentScores: {
        skills,
        experience,
        education,
        achievements,
      },
      recommendation: buildRecommendation(rawScore, config),
      riskFactors: identifyRiskFactors(skills, experience, education),
      strengths: identifyStrengths(skills, experience, education),
      decisionConfidence: calculateDecisionConfidence(rawScore, skills, experience),
    };
  } catch (error) {
    return failedOverallResult(describeFailure("Overall", error));
  }
}

export function scoreAchievements(achievementsText: string): number {
  const found = findKeywords(achievementsText.toLowerCase(), ACHIEVEMENT_KEYWORDS);
  return Math.min(50 + found.length * 8, 100);
}

export function buildRecommendation(score: number, config: ScoringConfig = DEFAULT_SCORING_CONFIG): Recommendation {
  if (score >= config.strongHireThreshold) {
    return {
      decision: "Strong Hire",
      confidence: "High",
      reasoning: "Candidate demonstrates strong alignment with role requirements",
      score: round2(score),
    };
  }
  if (score >= config.hireThreshold) {
    return {
      decision: "Hire",
      confidence: "Medium-High",
      reasoning: "Candidate meets most requirements with some areas for development",
      score: round2(score),
    };
  }
  if (score >= 50) {
    return {
      decision: "Maybe",
      confidence: "Medium",
      reasoning: "Candidate shows potential but has significant gaps",
      score: round2(score),
    };
  }
  return {
    decision: "Don't Hire",
    confidence: "High",
    reasoning: "Candidate does not meet minimum requirements",
    score: round2(score),
  };
}

export function calculateDecisionConfidence(
  overallScore: number,
  skillsTotal: number,
  experienceTotal: number,
): DecisionConfidence {
  const variance = Math.max(skillsTotal, experienceTotal) - Math.min(skillsTotal, experienceTotal);
  if (variance < 20 && (overallScore > 80 || overallScore < 40)) {
    return "High";
  }
  if (variance < 30) {
    return "Medium";
  }
  return "Low";
}

function identifyRiskFactors(skills: number, experience: number, education: number): string[] {
  const risks: string[] = [];
  if (skills < 60) {
    risks.push("Significant technical skill gaps");
  }
  if (experience < 50) {
    risks.push("Limited relevant experience");
  }
  if (education < 40) {
    risks.push("Educational background concerns");
  }
  return risks;
}

function identifyStrengths(skills: number, experience: number, education: number): string[] {
  const strengths: string[] = [];
  if (skills >= 80) {
    strengths.push("Strong technical skills");
  }
  if (experience >= 80) {
    strengths.push("Extensive relevant experience");
  }
  if (education >= 80) {
    strengths.push("Strong educational background");
  }
  return strengths;
}

function failedOverallResult(error: string): OverallResult {
  return {
    overallScore: 0,
    componentScores: {
      skills: 0,
      experience: 0,
      education: 0,
      achievements: 0,
    },
    recommendation: {
      decision: "Don't Hire",
      confidence: "Low",
      reasoning: "Scoring could not be completed",
      score: 0,
    },
    riskFactors: [],
    strengths: [],
    decisionConfidence: "Low",
    error,
  };
}
