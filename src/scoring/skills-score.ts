import { SkillsScoreBreakdown } from "../shared/types/scoring.types";
import { CategorySkillMap, SkillMatchResult } from "../shared/types/skills.types";
import { describeFailure, requireFiniteNumber, round2 } from "./score-utils";

const TECHNICAL_WEIGHT = 0.4;
const DEPTH_WEIGHT = 0.3;
const RELEVANCE_WEIGHT = 0.3;

export function scoreSkills(matchResult: SkillMatchResult): SkillsScoreBreakdown {
  try {
    const overallMatch = requireFiniteNumber(matchResult.overallScore, "overallScore");
    if (overallMatch < 0) {
      throw new Error("overallScore must not be negative");
    }
    const exactCount = countListedSkills(matchResult.exactMatches, "exactMatches");
    const missingCount = countListedSkills(matchResult.missingSkills, "missingSkills");

    const technical = Math.min(overallMatch, 100);
    const depth = scoreSkillDepth(exactCount);
    const relevance = scoreSkillRelevance(exactCount, missingCount);
    const total =
      technical * TECHNICAL_WEIGHT +
      depth * DEPTH_WEIGHT +
      relevance * RELEVANCE_WEIGHT;

    return {
      technicalSkills: round2(technical),
      skillDepth: depth,
      skillRelevance: round2(relevance),
      totalScore: round2(total),
      details: {
        exactMatchesCount: exactCount,
        missingSkillsCount: missingCount,
        overallMatchPercentage: round2(overallMatch),
      },
    };
  } catch (error) {
    return failedSkillsScore(describeFailure("Skills", error));
  }
}

export function scoreSkillDepth(exactMatchCount: number): number {
  if (exactMatchCount >= 8) {
    return 90;
  }
  if (exactMatchCount >= 5) {
    return 75;
  }
  if (exactMatchCount >= 3) {
    return 60;
  }
  return 40;
}

export function scoreSkillRelevance(exactCount: number, missingCount: number): number {
  if (exactCount + missingCount === 0) {
    return 50;
  }
  return Math.min((exactCount / (exactCount + missingCount)) * 100, 100);
}

function countListedSkills(map: CategorySkillMap, field: string): number {
  if (typeof map !== "object" || map === null) {
    throw new Error(`${field} must be an object`);
  }
  let total = 0;
  for (const [category, skills] of Object.entries(map)) {
    if (skills === undefined) {
      continue;
    }
    if (!Array.isArray(skills)) {
      throw new Error(`${field}.${category} must be a list`);
    }
    total += skills.length;
  }
  return total;
}

function failedSkillsScore(error: string): SkillsScoreBreakdown {
  return {
    technicalSkills: 0,
    skillDepth: 0,
    skillRelevance: 0,
    totalScore: 0,
    details: {
      exactMatchesCount: 0,
      missingSkillsCount: 0,
      overallMatchPercentage: 0,
    },
    error,
  };
}
