import assert from "node:assert/strict";
import { test } from "node:test";
import { scoreSkillDepth, scoreSkills } from "../../scoring/skills-score";
import { SkillMatchResult } from "../../shared/types/skills.types";
import { matchSkills } from "../../skills/skill-match.calculator";

function buildMatch(overrides: Partial<SkillMatchResult>): SkillMatchResult {
  return {
    exactMatches: {},
    missingSkills: {},
    categoryScores: {},
    overallScore: 0,
    totalRequired: 0,
    totalMatched: 0,
    ...overrides,
  };
}

test("weights technical, depth and relevance", () => {
  const breakdown = scoreSkills(
    buildMatch({
      exactMatches: { programming_languages: ["python", "java"], databases: ["postgresql"] },
      missingSkills: { programming_languages: ["javascript"] },
      overallScore: 75,
      totalRequired: 4,
      totalMatched: 3,
    }),
  );

  assert.deepEqual(breakdown, {
    technicalSkills: 75,
    skillDepth: 60,
    skillRelevance: 75,
    totalScore: 70.5,
    details: {
      exactMatchesCount: 3,
      missingSkillsCount: 1,
      overallMatchPercentage: 75,
    },
  });
});

test("no skills on either side falls back to neutral relevance", () => {
  const breakdown = scoreSkills(matchSkills({}, {}));
  assert.equal(breakdown.technicalSkills, 0);
  assert.equal(breakdown.skillDepth, 40);
  assert.equal(breakdown.skillRelevance, 50);
  assert.equal(breakdown.totalScore, 27);
  assert.equal(breakdown.error, undefined);
});

test("eight exact matches reach the top depth step", () => {
  const breakdown = scoreSkills(
    buildMatch({
      exactMatches: {
        programming_languages: ["python", "go", "rust"],
        databases: ["postgresql", "redis"],
        cloud_platforms: ["aws", "docker", "kubernetes"],
      },
      overallScore: 100,
    }),
  );
  assert.equal(breakdown.skillDepth, 90);
  assert.equal(breakdown.skillRelevance, 100);
  assert.equal(breakdown.totalScore, 97);
});

test("depth steps", () => {
  assert.equal(scoreSkillDepth(8), 90);
  assert.equal(scoreSkillDepth(5), 75);
  assert.equal(scoreSkillDepth(4), 60);
  assert.equal(scoreSkillDepth(3), 60);
  assert.equal(scoreSkillDepth(2), 40);
});

test("technical score is capped at 100", () => {
  const breakdown = scoreSkills(buildMatch({ overallScore: 140 }));
  assert.equal(breakdown.technicalSkills, 100);
});

test("malformed input yields a zeroed breakdown with an error", () => {
  const breakdown = scoreSkills(buildMatch({ overallScore: Number.NaN }));
  assert.equal(breakdown.error, "Skills scoring error: overallScore must be a finite number");
  assert.equal(breakdown.totalScore, 0);
  assert.equal(breakdown.technicalSkills, 0);
  assert.equal(breakdown.skillDepth, 0);
  assert.equal(breakdown.skillRelevance, 0);

  const wrongShape = scoreSkills(
    buildMatch({ overallScore: 50, exactMatches: JSON.parse('{"programming_languages":"python"}') }),
  );
  assert.equal(wrongShape.error, "Skills scoring error: exactMatches.programming_languages must be a list");
  assert.equal(wrongShape.totalScore, 0);
});
