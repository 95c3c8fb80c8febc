export interface ScoringConfig {
  readonly hireThreshold: number;
  readonly strongHireThreshold: number;
}

export interface SkillsScoreDetails {
  exactMatchesCount: number;
  missingSkillsCount: number;
  overallMatchPercentage: number;
}

export interface SkillsScoreBreakdown {
  technicalSkills: number;
  skillDepth: number;
  skillRelevance: number;
  totalScore: number;
  details: SkillsScoreDetails;
  error?: string;
}

export interface ExperienceScoreDetails {
  detectedYears: number;
  seniorityKeywords: string[];
}

export interface ExperienceScoreBreakdown {
  yearsOfExperience: number;
  roleRelevance: number;
  industryMatch: number;
  careerProgression: number;
  totalScore: number;
  details: ExperienceScoreDetails;
  error?: string;
}

export type DegreeLevel = "associate" | "bachelor" | "master" | "doctorate" | "phd";

export interface EducationScoreDetails {
  candidateDegree: DegreeLevel | null;
  requiredDegree: DegreeLevel | null;
  certificationKeywords: string[];
}

export interface EducationScoreBreakdown {
  degreeMatch: number;
  fieldRelevance: number;
  certifications: number;
  totalScore: number;
  details: EducationScoreDetails;
  error?: string;
}

export type HiringDecision = "Strong Hire" | "Hire" | "Maybe" | "Don't Hire";

export type RecommendationConfidence = "High" | "Medium-High" | "Medium" | "Low";

export type DecisionConfidence = "High" | "Medium" | "Low";

export interface Recommendation {
  decision: HiringDecision;
  confidence: RecommendationConfidence;
  reasoning: string;
  score: number;
}

export interface ComponentScores {
  skills: number;
  experience: number;
  education: number;
  achievements: number;
}

export interface OverallResult {
  overallScore: number;
  componentScores: ComponentScores;
  recommendation: Recommendation;
  riskFactors: string[];
  strengths: string[];
  decisionConfidence: DecisionConfidence;
  error?: string;
}
