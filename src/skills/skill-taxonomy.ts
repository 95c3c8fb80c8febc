import taxonomyData from "./data/skill-taxonomy.json";
import {
  SKILL_CATEGORIES,
  SkillCategory,
  SkillTaxonomy,
  SynonymTable,
} from "../shared/types/skills.types";

export interface LoadedSkillTaxonomy {
  readonly categories: SkillTaxonomy;
  readonly synonyms: SynonymTable;
  readonly categoryBySkill: ReadonlyMap<string, SkillCategory>;
  readonly canonicalBySurfaceForm: ReadonlyMap<string, string>;
}

const LEADING_QUALIFIER = /^(?:expert|advanced|proficient|experienced)\s+/;
const TRAILING_QUALIFIER = /\s+(?:experiences?|skills?)$/;
const PARENTHETICAL = /\s*\([^)]*\)/g;
const TRAILING_VERSION = /\s+\d+(?:\.\d+)*\+?$/;

/**
 * Reduces a free-form skill label to the form used by the taxonomy tables,
 * e.g. "Advanced JavaScript Skills" -> "javascript", "Java 8+" -> "java".
 */
export function normalizeSkill(raw: string): string {
  return raw
    .toLowerCase()
    .trim()
    .replace(LEADING_QUALIFIER, "")
    .replace(TRAILING_QUALIFIER, "")
    .replace(PARENTHETICAL, "")
    .replace(TRAILING_VERSION, "")
    .trim();
}

export function isSkillCategory(value: string): value is SkillCategory {
  return SKILL_CATEGORIES.some((category) => category === value);
}

/**
 * Validates raw taxonomy data and freezes it. Throws on malformed data.
 */
export function buildSkillTaxonomy(raw: unknown): LoadedSkillTaxonomy {
  if (!isRecord(raw) || !isRecord(raw.categories) || !isRecord(raw.synonyms)) {
    throw new Error("Invalid skill taxonomy: expected `categories` and `synonyms` objects");
  }
  const rawCategories = raw.categories;
  const rawSynonyms = raw.synonyms;

  for (const key of Object.keys(rawCategories)) {
    if (!isSkillCategory(key)) {
      throw new Error(`Invalid skill taxonomy: unknown category ${key}`);
    }
  }

  const categoryBySkill = new Map<string, SkillCategory>();
  const categories = buildCategoryRecord((category) => {
    const skills = readTermList(rawCategories[category], `categories.${category}`);
    for (const skill of skills) {
      const owner = categoryBySkill.get(skill);
      if (owner) {
        throw new Error(`Invalid skill taxonomy: ${skill} is listed under both ${owner} and ${category}`);
      }
      categoryBySkill.set(skill, category);
    }
    return Object.freeze(skills);
  });

  const canonicalBySurfaceForm = new Map<string, string>();
  for (const skill of categoryBySkill.keys()) {
    canonicalBySurfaceForm.set(skill, skill);
  }

  const synonyms: Record<string, ReadonlyArray<string>> = {};
  for (const [canonical, value] of Object.entries(rawSynonyms)) {
    if (!categoryBySkill.has(canonical)) {
      throw new Error(`Invalid skill taxonomy: synonym entry ${canonical} is not a canonical skill`);
    }
    const forms = readTermList(value, `synonyms.${canonical}`);
    for (const form of forms) {
      if (!canonicalBySurfaceForm.has(form)) {
        canonicalBySurfaceForm.set(form, canonical);
      }
    }
    synonyms[canonical] = Object.freeze(forms);
  }

  return Object.freeze({
    categories: Object.freeze(categories),
    synonyms: Object.freeze(synonyms),
    categoryBySkill,
    canonicalBySurfaceForm,
  });
}

export const SKILL_TAXONOMY: LoadedSkillTaxonomy = buildSkillTaxonomy(taxonomyData);

export function categoryOfSkill(
  canonical: string,
  taxonomy: LoadedSkillTaxonomy = SKILL_TAXONOMY,
): SkillCategory | null {
  return taxonomy.categoryBySkill.get(canonical) ?? null;
}

/**
 * Maps a free-form label to its canonical skill through the canonical names
 * and the synonym table. Returns null for labels the taxonomy does not know.
 */
export function resolveCanonicalSkill(
  raw: string,
  taxonomy: LoadedSkillTaxonomy = SKILL_TAXONOMY,
): string | null {
  const normalized = normalizeSkill(raw);
  if (!normalized) {
    return null;
  }
  return taxonomy.canonicalBySurfaceForm.get(normalized) ?? null;
}

function buildCategoryRecord<T>(build: (category: SkillCategory) => T): Record<SkillCategory, T> {
  return {
    programming_languages: build("programming_languages"),
    web_technologies: build("web_technologies"),
    databases: build("databases"),
    cloud_platforms: build("cloud_platforms"),
    data_science: build("data_science"),
    engineering_practices: build("engineering_practices"),
    developer_tools: build("developer_tools"),
    soft_skills: build("soft_skills"),
  };
}

function readTermList(value: unknown, path: string): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`Invalid skill taxonomy: ${path} must be an array`);
  }
  const terms: string[] = [];
  for (const item of value) {
    if (typeof item !== "string" || !item.trim() || item !== item.trim().toLowerCase()) {
      throw new Error(`Invalid skill taxonomy: ${path} contains a non-normalized term`);
    }
    if (!terms.includes(item)) {
      terms.push(item);
    }
  }
  return terms;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
