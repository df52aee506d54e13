/**
 * CloudWatch Logs Retention Types
 */

/**
 * Retention periods in days accepted by PutRetentionPolicy.
 */
export const VALID_RETENTION_DAYS = [
  1, 3, 5, 7, 14, 30, 60, 90, 120, 150, 180, 365, 400, 545, 731,
  1096, 1827, 2192, 2557, 2922, 3288, 3653,
] as const;

export type RetentionDays = (typeof VALID_RETENTION_DAYS)[number];

/**
 * Check that a number is one of the accepted retention periods.
 */
export function isRetentionDays(days: number): days is RetentionDays {
  return VALID_RETENTION_DAYS.some((valid) => valid === days);
}
