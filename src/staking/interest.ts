/**
 * Interest Tiers
 *
 * Interest is a one-off payout per stake cycle, sized by how long the
 * principal has sat in the pool:
 *
 *   none   - under 1 day,  0%
 *   daily  - 1 day+,       1%
 *   weekly - 1 week+,     10%
 *
 * All amounts are integer token units; division truncates.
 */

// ============ Types ============

export type InterestTier = 'none' | 'daily' | 'weekly';

export interface InterestTierConfig {
  name: string;
  minElapsed: number;   // Seconds staked before the tier applies
  ratePercent: bigint;  // Whole percent of principal
}

// ============ Configuration ============

export const SECONDS_PER_DAY = 86_400;
export const SECONDS_PER_WEEK = 7 * SECONDS_PER_DAY;

export const INTEREST_TIERS: Record<InterestTier, InterestTierConfig> = {
  weekly: {
    name: 'Weekly',
    minElapsed: SECONDS_PER_WEEK,
    ratePercent: 10n,
  },
  daily: {
    name: 'Daily',
    minElapsed: SECONDS_PER_DAY,
    ratePercent: 1n,
  },
  none: {
    name: 'None',
    minElapsed: 0,
    ratePercent: 0n,
  },
};

// ============ Calculator ============

/**
 * Tier reached after `elapsed` seconds (negative counts as zero)
 */
export function tierFor(elapsed: number): InterestTier {
  // Check tiers in order of highest to lowest
  if (elapsed >= INTEREST_TIERS.weekly.minElapsed) return 'weekly';
  if (elapsed >= INTEREST_TIERS.daily.minElapsed) return 'daily';
  return 'none';
}

/**
 * Interest owed on `stakedAmount` after `elapsed` seconds
 */
export function calculateInterest(stakedAmount: bigint, elapsed: number): bigint {
  if (stakedAmount <= 0n) return 0n;
  const { ratePercent } = INTEREST_TIERS[tierFor(elapsed)];
  return (stakedAmount * ratePercent) / 100n;
}

/**
 * Interest for a cycle that began at `startTime`, observed at `now`.
 * A start time of 0 means no cycle is running.
 */
export function interestAt(stakedAmount: bigint, startTime: number, now: number): bigint {
  if (startTime === 0) return 0n;
  return calculateInterest(stakedAmount, now - startTime);
}
