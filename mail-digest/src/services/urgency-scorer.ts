/**
 * Urgency Scorer
 * Maps days left before a deadline to an ordinal level, 6 being most urgent.
 *
 *   no deadline | > 14 -> 1
 *   8-14              -> 2
 *   4-7               -> 3
 *   2-3               -> 4
 *   1                 -> 5
 *   <= 0 (today/late) -> 6
 */

export type UrgencyLevel = 1 | 2 | 3 | 4 | 5 | 6;

export const MIN_URGENCY: UrgencyLevel = 1;
export const MAX_URGENCY: UrgencyLevel = 6;

export interface UrgencyResult {
  daysLeft: number | null;
  urgencyLevel: UrgencyLevel;
}

export function urgencyForDaysLeft(daysLeft: number | null): UrgencyLevel {
  if (daysLeft === null || Number.isNaN(daysLeft)) return 1;

  const days = Math.floor(daysLeft);

  if (days <= 0) return 6;
  if (days === 1) return 5;
  if (days <= 3) return 4;
  if (days <= 7) return 3;
  if (days <= 14) return 2;
  return 1;
}

export function scoreUrgency(daysLeft: number | null): UrgencyResult {
  return { daysLeft, urgencyLevel: urgencyForDaysLeft(daysLeft) };
}

export default { urgencyForDaysLeft, scoreUrgency };
