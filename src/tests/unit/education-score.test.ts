import assert from "node:assert/strict";
import { test } from "node:test";
import { detectDegree, scoreDegreeMatch, scoreEducation } from "../../scoring/education-score";

test("higher degree in a technical field with certifications", () => {
  const breakdown = scoreEducation(
    "Master of Science in Software Engineering",
    "Bachelor degree in Computer Science required",
    "AWS Certified Solutions Architect",
  );

  assert.deepEqual(breakdown, {
    degreeMatch: 100,
    fieldRelevance: 90,
    certifications: 40,
    totalScore: 84,
    details: {
      candidateDegree: "master",
      requiredDegree: "bachelor",
      certificationKeywords: ["certified", "aws"],
    },
  });
});

test("no stated requirement keeps neutral degree and field scores", () => {
  const breakdown = scoreEducation("", "Strong communicator");
  assert.equal(breakdown.degreeMatch, 80);
  assert.equal(breakdown.fieldRelevance, 80);
  assert.equal(breakdown.certifications, 0);
  assert.equal(breakdown.totalScore, 64);
});

test("missing degree against a requirement", () => {
  const breakdown = scoreEducation("Self-taught developer", "Bachelor degree required");
  assert.equal(breakdown.degreeMatch, 30);
  assert.equal(breakdown.fieldRelevance, 80);
  assert.equal(breakdown.totalScore, 44);
});

test("one level below the requirement", () => {
  const breakdown = scoreEducation("Bachelor of Arts", "Master's degree");
  assert.equal(breakdown.degreeMatch, 70);
  assert.equal(breakdown.totalScore, 60);
});

test("several levels below in an unrelated field", () => {
  const breakdown = scoreEducation("Associate degree", "PhD in statistics");
  assert.equal(breakdown.degreeMatch, 40);
  assert.equal(breakdown.fieldRelevance, 50);
  assert.equal(breakdown.totalScore, 36);
});

test("certification score is capped at 100", () => {
  const breakdown = scoreEducation("", "", "certified certification aws azure pmp itil");
  assert.equal(breakdown.certifications, 100);
  assert.equal(breakdown.details.certificationKeywords.length, 6);
});

test("degree detection and ranking", () => {
  assert.equal(detectDegree("phd and master"), "phd");
  assert.equal(detectDegree("doctorate in physics"), "doctorate");
  assert.equal(detectDegree("no formal education"), null);
  assert.equal(scoreDegreeMatch("phd", "doctorate"), 100);
  assert.equal(scoreDegreeMatch(null, null), 80);
});

test("non-string input yields a zeroed breakdown", () => {
  const breakdown = scoreEducation(JSON.parse("null"), "Bachelor degree");
  assert.equal(breakdown.error, "Education scoring error: candidateEducationText must be a string");
  assert.equal(breakdown.totalScore, 0);
  assert.equal(breakdown.details.candidateDegree, null);
});

test("certifications are only read from achievements", () => {
  const breakdown = scoreEducation("AWS Certified Solutions Architect", "");
  assert.equal(breakdown.certifications, 0);
  assert.deepEqual(breakdown.details.certificationKeywords, []);
  assert.equal(breakdown.totalScore, 64);
});
