import assert from "node:assert/strict";
import { test } from "node:test";
import { analyzeSkillDepth, getSkillRecommendations } from "../../skills/skill-insights";

test("recommendations cover only categories with missing skills", () => {
  const recommendations = getSkillRecommendations({
    programming_languages: ["go"],
    soft_skills: ["teamwork"],
    databases: [],
  });

  assert.deepEqual(Object.keys(recommendations), ["programming_languages", "soft_skills"]);
  assert.deepEqual(recommendations.programming_languages, [
    "Consider online coding bootcamps or courses",
    "Practice with coding challenges on platforms like LeetCode or HackerRank",
    "Build personal projects to demonstrate proficiency",
  ]);
  assert.deepEqual(recommendations.soft_skills, [
    "Develop soft_skills skills through relevant courses and practice",
  ]);
});

test("skill depth reads level words near the first mention", () => {
  const filler = "Worked across many internal tooling projects for the payments group.";
  const text = `Senior engineer with python. ${filler} Basic knowledge of rust.`;

  assert.deepEqual(analyzeSkillDepth(text, ["python", "rust", "kotlin"]), {
    python: "expert",
    rust: "beginner",
    kotlin: "mentioned",
  });
});

test("a mention without level words stays mentioned", () => {
  assert.deepEqual(analyzeSkillDepth("Used docker daily.", ["docker"]), { docker: "mentioned" });
});
