/**
 * Bucket ids and the thresholds the classifier compares against.
 */

/**
 * Every bucket the classifier can emit, in ascending order of duration.
 */
export const BUCKET_IDS = [
  "less_than_x_seconds",
  "half_a_minute",
  "less_than_x_minutes",
  "x_minutes",
  "about_x_hours",
  "x_days",
  "about_x_months",
  "x_months",
  "about_x_years",
  "over_x_years",
  "almost_x_years",
] as const;

export type BucketId = (typeof BUCKET_IDS)[number];

/**
 * Classification outcome: the bucket plus the count its phrase interpolates.
 */
export type Bucket = {
  readonly id: BucketId;
  readonly count: number;
};

const BUCKET_ID_SET: ReadonlySet<string> = new Set(BUCKET_IDS);

export function isBucketId(value: unknown): value is BucketId {
  return typeof value === "string" && BUCKET_ID_SET.has(value);
}

export function bucket(id: BucketId, count: number): Bucket {
  return Object.freeze({ id, count });
}

// =============================================================================
// Thresholds
// =============================================================================

// Years are 365 days; there is no leap-year correction.
export const MINUTES_IN_YEAR = 525_600;
export const MINUTES_IN_QUARTER_YEAR = 131_400; // 91.25 days
export const MINUTES_IN_THREE_QUARTERS_YEAR = 394_200; // 273.75 days

export const MINUTES_IN_HOUR = 60;
export const MINUTES_IN_DAY = 1_440;
export const MINUTES_IN_MONTH = 43_200; // 30 days
