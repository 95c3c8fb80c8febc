import { AnalysisRequest, ExperienceAnalysis } from "../shared/types/analysis.types";
import { CategorySkillMap, SKILL_CATEGORIES } from "../shared/types/skills.types";
import { mergeSkillMaps } from "../skills/skill.extractor";
import {
  LoadedSkillTaxonomy,
  SKILL_TAXONOMY,
  categoryOfSkill,
  isSkillCategory,
  resolveCanonicalSkill,
} from "../skills/skill-taxonomy";

const MAX_TEXT = 50_000;
const MAX_LIST_ITEMS = 200;

export type ParseResult<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error: string;
    };

export interface ExtractRequest {
  text: string;
}

export interface MatchRequest {
  candidate: CategorySkillMap;
  required: CategorySkillMap;
}

/**
 * Normalizes an analysis request body. Optional candidate and job sub-fields
 * fall back to the full profile or description text, never to "".
 */
export function parseAnalysisRequest(raw: unknown): ParseResult<AnalysisRequest> {
  if (!isRecord(raw)) {
    return invalid("Request body must be a JSON object");
  }
  if (!isRecord(raw.candidate)) {
    return invalid("candidate must be an object");
  }
  if (!isRecord(raw.job)) {
    return invalid("job must be an object");
  }

  const candidate = raw.candidate;
  const job = raw.job;
  const oversized = findLimitViolation([
    ["candidate.profileText", candidate.profileText],
    ["candidate.workHistory", candidate.workHistory],
    ["candidate.education", candidate.education],
    ["candidate.achievements", candidate.achievements],
    ["candidate.skills", candidate.skills],
    ["job.descriptionText", job.descriptionText],
    ["job.educationalRequirements", job.educationalRequirements],
    ["job.skills", job.skills],
  ]);
  if (oversized) {
    return invalid(oversized);
  }
  const profileText = toText(candidate.profileText);
  if (!profileText) {
    return invalid("candidate.profileText is required");
  }
  const descriptionText = toText(job.descriptionText);
  if (!descriptionText) {
    return invalid("job.descriptionText is required");
  }

  const experienceAnalysis = parseExperienceAnalysis(raw.experienceAnalysis);
  if (!experienceAnalysis.ok) {
    return experienceAnalysis;
  }

  return {
    ok: true,
    data: {
      candidate: {
        profileText,
        workHistory: toText(candidate.workHistory) || profileText,
        education: toText(candidate.education) || profileText,
        achievements: toText(candidate.achievements) || profileText,
        skills: toStringArray(candidate.skills),
      },
      job: {
        descriptionText,
        educationalRequirements: toText(job.educationalRequirements) || descriptionText,
        skills: toStringArray(job.skills),
      },
      experienceAnalysis: experienceAnalysis.data,
    },
  };
}

export function parseExtractRequest(raw: unknown): ParseResult<ExtractRequest> {
  if (!isRecord(raw)) {
    return invalid("Request body must be a JSON object");
  }
  if (typeof raw.text !== "string") {
    return invalid("text must be a string");
  }
  if (raw.text.length > MAX_TEXT) {
    return invalid(`text exceeds ${MAX_TEXT} characters`);
  }
  return { ok: true, data: { text: raw.text } };
}

export function parseMatchRequest(
  raw: unknown,
  taxonomy: LoadedSkillTaxonomy = SKILL_TAXONOMY,
): ParseResult<MatchRequest> {
  if (!isRecord(raw)) {
    return invalid("Request body must be a JSON object");
  }
  const candidate = toCategorySkillMap(raw.candidate, "candidate", taxonomy);
  if (!candidate.ok) {
    return candidate;
  }
  const required = toCategorySkillMap(raw.required, "required", taxonomy);
  if (!required.ok) {
    return required;
  }
  return { ok: true, data: { candidate: candidate.data, required: required.data } };
}

/**
 * Reads a category -> skill list object. Each label is resolved to its
 * canonical name and kept only when it belongs to the category it is listed
 * under.
 */
export function toCategorySkillMap(
  value: unknown,
  field: string,
  taxonomy: LoadedSkillTaxonomy = SKILL_TAXONOMY,
): ParseResult<CategorySkillMap> {
  if (!isRecord(value)) {
    return invalid(`${field} must be an object of category skill lists`);
  }
  const collected: CategorySkillMap = {};
  for (const [key, skills] of Object.entries(value)) {
    if (!isSkillCategory(key)) {
      return invalid(`${field}.${key} is not a known skill category (${SKILL_CATEGORIES.join(", ")})`);
    }
    if (!Array.isArray(skills)) {
      return invalid(`${field}.${key} must be a list of skills`);
    }
    if (skills.length > MAX_LIST_ITEMS) {
      return invalid(`${field}.${key} exceeds ${MAX_LIST_ITEMS} items`);
    }
    const resolved: string[] = [];
    for (const label of toStringArray(skills)) {
      const canonical = resolveCanonicalSkill(label, taxonomy);
      if (canonical && categoryOfSkill(canonical, taxonomy) === key) {
        resolved.push(canonical);
      }
    }
    collected[key] = resolved;
  }
  return { ok: true, data: mergeSkillMaps(collected, {}, taxonomy) };
}

function parseExperienceAnalysis(value: unknown): ParseResult<ExperienceAnalysis | undefined> {
  if (value === undefined || value === null) {
    return { ok: true, data: undefined };
  }
  if (!isRecord(value)) {
    return invalid("experienceAnalysis must be an object");
  }
  const roleRelevance = toOptionalPercentage(value.roleRelevance);
  if (roleRelevance === null) {
    return invalid("experienceAnalysis.roleRelevance must be a number between 0 and 100");
  }
  const industryMatch = toOptionalPercentage(value.industryMatch);
  if (industryMatch === null) {
    return invalid("experienceAnalysis.industryMatch must be a number between 0 and 100");
  }
  return { ok: true, data: { roleRelevance, industryMatch } };
}

// undefined when absent, null when present but not a 0-100 number.
function toOptionalPercentage(value: unknown): number | undefined | null {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 100) {
    return null;
  }
  return value;
}

// Texts are measured after whitespace is collapsed.
function findLimitViolation(fields: ReadonlyArray<readonly [string, unknown]>): string | undefined {
  for (const [field, value] of fields) {
    if (typeof value === "string" && toText(value).length > MAX_TEXT) {
      return `${field} exceeds ${MAX_TEXT} characters`;
    }
    if (Array.isArray(value) && value.length > MAX_LIST_ITEMS) {
      return `${field} exceeds ${MAX_LIST_ITEMS} items`;
    }
  }
  return undefined;
}

function toText(value: unknown): string {
  if (typeof value !== "string") {
    return "";
  }
  return value.replace(/\s+/g, " ").trim();
}

function toStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((item) => toText(item))
    .filter((item) => Boolean(item));
}

function invalid(error: string): { ok: false; error: string } {
  return { ok: false, error };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
