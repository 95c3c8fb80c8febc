import {
  CategorySkillMap,
  SKILL_CATEGORIES,
  SkillCategory,
  SkillMatchResult,
} from "../shared/types/skills.types";

/**
 * Compares a candidate's skills with the skills a job requires, per category.
 * Categories with no required skills are skipped entirely: they contribute
 * nothing to the totals and get no category score.
 */
export function matchSkills(candidate: CategorySkillMap, required: CategorySkillMap): SkillMatchResult {
  const exactMatches: CategorySkillMap = {};
  const missingSkills: CategorySkillMap = {};
  const categoryScores: Partial<Record<SkillCategory, number>> = {};
  let totalRequired = 0;
  let totalMatched = 0;

  for (const category of presentCategories(candidate, required)) {
    const requiredSet = new Set(required[category] ?? []);
    if (requiredSet.size === 0) {
      continue;
    }
    const candidateSet = new Set(candidate[category] ?? []);

    const matched = [...requiredSet].filter((skill) => candidateSet.has(skill));
    const missing = [...requiredSet].filter((skill) => !candidateSet.has(skill));

    exactMatches[category] = matched;
    missingSkills[category] = missing;
    categoryScores[category] = (matched.length / requiredSet.size) * 100;

    totalRequired += requiredSet.size;
    totalMatched += matched.length;
  }

  return {
    exactMatches,
    missingSkills,
    categoryScores,
    overallScore: totalRequired > 0 ? (totalMatched / totalRequired) * 100 : 0,
    totalRequired,
    totalMatched,
  };
}

function presentCategories(left: CategorySkillMap, right: CategorySkillMap): SkillCategory[] {
  return SKILL_CATEGORIES.filter((category) => category in left || category in right);
}
