import { DegreeLevel, EducationScoreBreakdown } from "../shared/types/scoring.types";
import { describeFailure, findKeywords, requireText, round2 } from "./score-utils";

const DEGREE_WEIGHT = 0.4;
const FIELD_WEIGHT = 0.4;
const CERTIFICATION_WEIGHT = 0.2;

// Highest level first: the first hit is the highest degree mentioned.
const DEGREE_LEVELS: ReadonlyArray<DegreeLevel> = ["phd", "doctorate", "master", "bachelor", "associate"];

const DEGREE_RANK: Record<DegreeLevel, number> = {
  associate: 1,
  bachelor: 2,
  master: 3,
  doctorate: 4,
  phd: 4,
};

const TECH_FIELDS = [
  "computer science",
  "software",
  "engineering",
  "technology",
  "information systems",
  "data science",
  "mathematics",
  "statistics",
];

const CERTIFICATION_KEYWORDS = [
  "certified",
  "certification",
  "aws",
  "azure",
  "google cloud",
  "pmp",
  "scrum master",
  "agile",
  "itil",
  "cissp",
];

export function scoreEducation(
  candidateEducationText: string,
  jobEducationText: string,
  achievementsText = "",
): EducationScoreBreakdown {
  try {
    const candidateText = requireText(candidateEducationText, "candidateEducationText").toLowerCase();
    const jobText = requireText(jobEducationText, "jobEducationText").toLowerCase();
    const achievements = requireText(achievementsText, "achievementsText").toLowerCase();

    const candidateDegree = detectDegree(candidateText);
    const requiredDegree = detectDegree(jobText);
    const degreeMatch = scoreDegreeMatch(candidateDegree, requiredDegree);
    const fieldRelevance = scoreFieldRelevance(candidateText, jobText);
    const certificationKeywords = findKeywords(achievements, CERTIFICATION_KEYWORDS);
    const certifications = Math.min(certificationKeywords.length * 20, 100);

    const total =
      degreeMatch * DEGREE_WEIGHT +
      fieldRelevance * FIELD_WEIGHT +
      certifications * CERTIFICATION_WEIGHT;

    return {
      degreeMatch,
      fieldRelevance,
      certifications,
      totalScore: round2(total),
      details: {
        candidateDegree,
        requiredDegree,
        certificationKeywords,
      },
    };
  } catch (error) {
    return failedEducationScore(describeFailure("Education", error));
  }
}

export function detectDegree(lowerText: string): DegreeLevel | null {
  return DEGREE_LEVELS.find((degree) => lowerText.includes(degree)) ?? null;
}

export function scoreDegreeMatch(candidate: DegreeLevel | null, required: DegreeLevel | null): number {
  if (!required) {
    return 80;
  }
  if (!candidate) {
    return 30;
  }
  const candidateRank = DEGREE_RANK[candidate];
  const requiredRank = DEGREE_RANK[required];
  if (candidateRank >= requiredRank) {
    return 100;
  }
  if (candidateRank === requiredRank - 1) {
    return 70;
  }
  return 40;
}

function scoreFieldRelevance(candidateText: string, jobText: string): number {
  const jobRequiresTech = TECH_FIELDS.some((field) => jobText.includes(field));
  if (!jobRequiresTech) {
    return 80;
  }
  return TECH_FIELDS.some((field) => candidateText.includes(field)) ? 90 : 50;
}

function failedEducationScore(error: string): EducationScoreBreakdown {
  return {
    degreeMatch: 0,
    fieldRelevance: 0,
    certifications: 0,
    totalScore: 0,
    details: {
      candidateDegree: null,
      requiredDegree: null,
      certificationKeywords: [],
    },
    error,
  };
}
