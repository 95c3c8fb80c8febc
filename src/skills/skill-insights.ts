import {
  CategorySkillMap,
  SKILL_CATEGORIES,
  SkillCategory,
  SkillDepthLevel,
  SkillRecommendations,
} from "../shared/types/skills.types";

const CATEGORY_ADVICE: Partial<Record<SkillCategory, string[]>> = {
  programming_languages: [
    "Consider online coding bootcamps or courses",
    "Practice with coding challenges on platforms like LeetCode or HackerRank",
    "Build personal projects to demonstrate proficiency",
  ],
  web_technologies: [
    "Complete framework-specific tutorials and documentation",
    "Build full-stack web applications",
    "Contribute to open-source projects",
  ],
  cloud_platforms: [
    "Obtain cloud certifications (AWS, Azure, GCP)",
    "Practice with free tier cloud services",
    "Deploy personal projects to cloud platforms",
  ],
  data_science: [
    "Complete data science courses or bootcamps",
    "Work on Kaggle competitions",
    "Build and showcase data analysis projects",
  ],
};

const DEPTH_INDICATORS: ReadonlyArray<{ level: Exclude<SkillDepthLevel, "mentioned">; indicators: string[] }> = [
  {
    level: "expert",
    indicators: ["expert", "lead", "senior", "architect", "advanced", "10+ years", "extensive"],
  },
  {
    level: "proficient",
    indicators: ["proficient", "experienced", "solid", "strong", "5+ years", "commercial"],
  },
  {
    level: "intermediate",
    indicators: ["intermediate", "working knowledge", "familiar", "some experience", "2+ years"],
  },
  {
    level: "beginner",
    indicators: ["basic", "beginner", "learning", "exposure", "introduction", "started"],
  },
];

const DEPTH_WINDOW_CHARS = 50;

export function getSkillRecommendations(missingSkills: CategorySkillMap): SkillRecommendations {
  const recommendations: SkillRecommendations = {};
  for (const category of SKILL_CATEGORIES) {
    const missing = missingSkills[category] ?? [];
    if (missing.length === 0) {
      continue;
    }
    recommendations[category] = [
      ...(CATEGORY_ADVICE[category] ?? [
        `Develop ${category} skills through relevant courses and practice`,
      ]),
    ];
  }
  return recommendations;
}

/**
 * Classifies how deeply each skill is claimed by looking for level words near
 * its first mention. The window starts 50 chars before the mention and ends
 * 50 chars after where it starts.
 */
export function analyzeSkillDepth(
  text: string,
  skills: ReadonlyArray<string>,
): Record<string, SkillDepthLevel> {
  const lowerText = text.toLowerCase();
  const depth: Record<string, SkillDepthLevel> = {};

  for (const skill of skills) {
    const position = lowerText.indexOf(skill.toLowerCase());
    if (position === -1) {
      depth[skill] = "mentioned";
      continue;
    }
    const window = lowerText.slice(
      Math.max(0, position - DEPTH_WINDOW_CHARS),
      position + DEPTH_WINDOW_CHARS,
    );
    const matched = DEPTH_INDICATORS.find((entry) =>
      entry.indicators.some((indicator) => window.includes(indicator)),
    );
    depth[skill] = matched?.level ?? "mentioned";
  }

  return depth;
}
