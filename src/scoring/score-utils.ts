export function requireFiniteNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${field} must be a finite number`);
  }
  return value;
}

export function requireText(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new Error(`${field} must be a string`);
  }
  return value;
}

export function requirePercentage(value: unknown, field: string): number {
  const numeric = requireFiniteNumber(value, field);
  if (numeric < 0 || numeric > 100) {
    throw new Error(`${field} must be between 0 and 100`);
  }
  return numeric;
}

export function describeFailure(scope: string, error: unknown): string {
  return `${scope} scoring error: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Lower-cased keywords from `keywords` that occur anywhere in `lowerText`,
 * plain substring match, each counted once.
 */
export function findKeywords(lowerText: string, keywords: ReadonlyArray<string>): string[] {
  return keywords.filter((keyword) => lowerText.includes(keyword));
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
