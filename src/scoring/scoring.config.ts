import { ScoringConfig } from "../shared/types/scoring.types";

export const DEFAULT_HIRE_THRESHOLD = 70;
export const DEFAULT_STRONG_HIRE_THRESHOLD = 85;

export const DEFAULT_SCORING_CONFIG: ScoringConfig = Object.freeze({
  hireThreshold: DEFAULT_HIRE_THRESHOLD,
  strongHireThreshold: DEFAULT_STRONG_HIRE_THRESHOLD,
});

export function createScoringConfig(overrides?: Partial<ScoringConfig>): ScoringConfig {
  const hireThreshold = overrides?.hireThreshold ?? DEFAULT_HIRE_THRESHOLD;
  const strongHireThreshold = overrides?.strongHireThreshold ?? DEFAULT_STRONG_HIRE_THRESHOLD;

  if (!isThreshold(hireThreshold)) {
    throw new Error(`Invalid hire threshold: ${hireThreshold}. Expected number between 0 and 100.`);
  }
  if (!isThreshold(strongHireThreshold)) {
    throw new Error(`Invalid strong hire threshold: ${strongHireThreshold}. Expected number between 0 and 100.`);
  }
  if (strongHireThreshold < hireThreshold) {
    throw new Error(
      `Invalid strong hire threshold: ${strongHireThreshold}. Must not be lower than hire threshold ${hireThreshold}.`,
    );
  }

  return Object.freeze({ hireThreshold, strongHireThreshold });
}

function isThreshold(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 100;
}
