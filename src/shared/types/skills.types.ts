export const SKILL_CATEGORIES = [
  "programming_languages",
  "web_technologies",
  "databases",
  "cloud_platforms",
  "data_science",
  "engineering_practices",
  "developer_tools",
  "soft_skills",
] as const;

export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export type SkillTaxonomy = Readonly<Record<SkillCategory, ReadonlyArray<string>>>;

export type SynonymTable = Readonly<Record<string, ReadonlyArray<string>>>;

/**
 * Canonical skills found per category. Only categories with at least one
 * skill are present, and every listed skill belongs to that category.
 */
export type CategorySkillMap = Partial<Record<SkillCategory, string[]>>;

export interface SkillMatchResult {
  exactMatches: CategorySkillMap;
  missingSkills: CategorySkillMap;
  categoryScores: Partial<Record<SkillCategory, number>>;
  overallScore: number;
  totalRequired: number;
  totalMatched: number;
}

export type SkillDepthLevel = "expert" | "proficient" | "intermediate" | "beginner" | "mentioned";

export type SkillRecommendations = Partial<Record<SkillCategory, string[]>>;
