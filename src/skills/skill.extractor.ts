import { CategorySkillMap, SKILL_CATEGORIES, SkillCategory } from "../shared/types/skills.types";
import { LoadedSkillTaxonomy, SKILL_TAXONOMY, categoryOfSkill, resolveCanonicalSkill } from "./skill-taxonomy";

const termPatternCache = new Map<string, RegExp>();

/**
 * True when `term` occurs in `lowerText` with no word character directly
 * before or after it. "java" never matches inside "javascript", while
 * symbol-terminated terms such as "c++" or "node.js" still match.
 */
export function isSkillMentioned(term: string, lowerText: string): boolean {
  return buildTermPattern(term).test(lowerText);
}

/**
 * Scans free text for taxonomy skills and their synonyms. Synonym hits are
 * recorded under the canonical name. Overlapping terms such as "c" and "c++"
 * can both match; no precedence is applied between them.
 */
export function extractSkills(
  text: string,
  taxonomy: LoadedSkillTaxonomy = SKILL_TAXONOMY,
): CategorySkillMap {
  const lowerText = text.toLowerCase();
  const found = new Map<SkillCategory, Set<string>>();
  if (!lowerText.trim()) {
    return {};
  }

  for (const category of SKILL_CATEGORIES) {
    for (const skill of taxonomy.categories[category]) {
      if (isSkillMentioned(skill, lowerText)) {
        addSkill(found, category, skill);
      }
    }
  }

  for (const [canonical, forms] of Object.entries(taxonomy.synonyms)) {
    const category = categoryOfSkill(canonical, taxonomy);
    if (!category) {
      continue;
    }
    if (forms.some((form) => isSkillMentioned(form, lowerText))) {
      addSkill(found, category, canonical);
    }
  }

  return toCategorySkillMap(found, taxonomy);
}

/**
 * Categorizes an already-structured list of skill labels, e.g. one produced
 * by an upstream resume analysis. Labels the taxonomy does not know are dropped.
 */
export function categorizeSkillNames(
  names: ReadonlyArray<string>,
  taxonomy: LoadedSkillTaxonomy = SKILL_TAXONOMY,
): CategorySkillMap {
  const found = new Map<SkillCategory, Set<string>>();
  for (const name of names) {
    const canonical = resolveCanonicalSkill(name, taxonomy);
    if (!canonical) {
      continue;
    }
    const category = categoryOfSkill(canonical, taxonomy);
    if (category) {
      addSkill(found, category, canonical);
    }
  }
  return toCategorySkillMap(found, taxonomy);
}

export function mergeSkillMaps(
  left: CategorySkillMap,
  right: CategorySkillMap,
  taxonomy: LoadedSkillTaxonomy = SKILL_TAXONOMY,
): CategorySkillMap {
  const found = new Map<SkillCategory, Set<string>>();
  for (const source of [left, right]) {
    for (const category of SKILL_CATEGORIES) {
      for (const skill of source[category] ?? []) {
        addSkill(found, category, skill);
      }
    }
  }
  return toCategorySkillMap(found, taxonomy);
}

function addSkill(found: Map<SkillCategory, Set<string>>, category: SkillCategory, skill: string): void {
  const existing = found.get(category);
  if (existing) {
    existing.add(skill);
    return;
  }
  found.set(category, new Set([skill]));
}

// Emits skills in taxonomy order so equal inputs serialize identically.
function toCategorySkillMap(
  found: Map<SkillCategory, Set<string>>,
  taxonomy: LoadedSkillTaxonomy,
): CategorySkillMap {
  const result: CategorySkillMap = {};
  for (const category of SKILL_CATEGORIES) {
    const skills = found.get(category);
    if (!skills || skills.size === 0) {
      continue;
    }
    const ordered = taxonomy.categories[category].filter((skill) => skills.has(skill));
    if (ordered.length > 0) {
      result[category] = ordered;
    }
  }
  return result;
}

function buildTermPattern(term: string): RegExp {
  const key = term.toLowerCase();
  const cached = termPatternCache.get(key);
  if (cached) {
    return cached;
  }
  const pattern = new RegExp(`(?<!\\w)${escapeRegExp(key)}(?!\\w)`);
  termPatternCache.set(key, pattern);
  return pattern;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
