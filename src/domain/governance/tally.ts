import { VotePercentages } from './governanceTypes.js';

export const PERCENT_SCALE = 10_000;

/**
 * Floor-divided shares of the total. The two values may sum to less than
 * PERCENT_SCALE; the rounding loss is not redistributed.
 */
export const votePercentages = (yesCount: number, noCount: number): VotePercentages => {
  const total = yesCount + noCount;
  if (total === 0) return { yesPct: 0, noPct: 0 };

  return {
    yesPct: Math.floor((yesCount * PERCENT_SCALE) / total),
    noPct: Math.floor((noCount * PERCENT_SCALE) / total),
  };
};

/** Strict majority. A tie is not approved. */
export const isApproved = (yesCount: number, noCount: number): boolean => yesCount > noCount;
