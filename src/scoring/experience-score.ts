import { ExperienceAnalysis } from "../shared/types/analysis.types";
import { ExperienceScoreBreakdown } from "../shared/types/scoring.types";
import { describeFailure, findKeywords, requirePercentage, requireText, round2 } from "./score-utils";

const YEARS_WEIGHT = 0.3;
const ROLE_WEIGHT = 0.4;
const INDUSTRY_WEIGHT = 0.2;
const PROGRESSION_WEIGHT = 0.1;

// Baseline values used when no upstream analysis judged these factors.
export const DEFAULT_ROLE_RELEVANCE = 75;
export const DEFAULT_INDUSTRY_MATCH = 70;

const SENIORITY_KEYWORDS = [
  "promoted",
  "senior",
  "lead",
  "manager",
  "director",
  "principal",
  "architect",
  "head of",
  "chief",
];

const YEARS_MENTION = /(\d+)\+?\s*years?\b/g;
const YEAR_RANGE = /\b((?:19|20)\d{2})\s*[-–]\s*((?:19|20)\d{2})\b/g;
const YEAR_TO_PRESENT = /\b((?:19|20)\d{2})\s*[-–]\s*(?:present|current|now)\b/g;

export function scoreExperience(
  workHistoryText: string,
  auxAnalysis?: ExperienceAnalysis,
  now: Date = new Date(),
): ExperienceScoreBreakdown {
  try {
    const lowerText = requireText(workHistoryText, "workHistoryText").toLowerCase();
    const roleRelevance =
      auxAnalysis?.roleRelevance === undefined
        ? DEFAULT_ROLE_RELEVANCE
        : requirePercentage(auxAnalysis.roleRelevance, "roleRelevance");
    const industryMatch =
      auxAnalysis?.industryMatch === undefined
        ? DEFAULT_INDUSTRY_MATCH
        : requirePercentage(auxAnalysis.industryMatch, "industryMatch");

    const detectedYears = detectYearsOfExperience(lowerText, now.getFullYear());
    const yearsScore = scoreYears(detectedYears);
    const seniorityKeywords = findKeywords(lowerText, SENIORITY_KEYWORDS);
    const progression = Math.min(50 + seniorityKeywords.length * 10, 100);

    const total =
      yearsScore * YEARS_WEIGHT +
      roleRelevance * ROLE_WEIGHT +
      industryMatch * INDUSTRY_WEIGHT +
      progression * PROGRESSION_WEIGHT;

    return {
      yearsOfExperience: yearsScore,
      roleRelevance: round2(roleRelevance),
      industryMatch: round2(industryMatch),
      careerProgression: progression,
      totalScore: round2(total),
      details: {
        detectedYears,
        seniorityKeywords,
      },
    };
  } catch (error) {
    return failedExperienceScore(describeFailure("Experience", error));
  }
}

/**
 * Largest "<N> years" mention, or the summed span of year ranges
 * ("2015-2019", "2019-present"), whichever is greater.
 */
export function detectYearsOfExperience(lowerText: string, currentYear: number): number {
  let largestMention = 0;
  for (const match of lowerText.matchAll(YEARS_MENTION)) {
    const years = Number(match[1]);
    if (Number.isFinite(years)) {
      largestMention = Math.max(largestMention, years);
    }
  }

  let rangeTotal = 0;
  for (const match of lowerText.matchAll(YEAR_RANGE)) {
    rangeTotal += spanYears(Number(match[1]), Number(match[2]));
  }
  for (const match of lowerText.matchAll(YEAR_TO_PRESENT)) {
    rangeTotal += spanYears(Number(match[1]), currentYear);
  }

  return Math.max(largestMention, rangeTotal);
}

export function scoreYears(years: number): number {
  if (years >= 10) {
    return 100;
  }
  if (years >= 7) {
    return 90;
  }
  if (years >= 5) {
    return 80;
  }
  if (years >= 3) {
    return 70;
  }
  if (years >= 1) {
    return 60;
  }
  return 30;
}

function spanYears(start: number, end: number): number {
  if (!Number.isFinite(start) || !Number.isFinite(end) || end < start) {
    return 0;
  }
  return end - start;
}

function failedExperienceScore(error: string): ExperienceScoreBreakdown {
  return {
    yearsOfExperience: 0,
    roleRelevance: 0,
    industryMatch: 0,
    careerProgression: 0,
    totalScore: 0,
    details: {
      detectedYears: 0,
      seniorityKeywords: [],
    },
    error,
  };
}
