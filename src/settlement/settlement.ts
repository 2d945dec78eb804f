import { extractGuess } from '../guess/extract.js';
import type { SortedGuessIndex } from '../guess/sorted-guess-index.js';
import type { GroupSettlement } from '../types.js';

/**
 * Compute a group's winners and payout shares from the round's signal.
 *
 * A signal that maps to no guess leaves the group without winners, and every
 * wager in it is refunded instead. Otherwise the nearest guess wins the pot
 * after commission; an exact tie splits it, with the odd unit reserved for
 * whichever of the two winners claims first.
 */
export function settleGroup(
  group: { index: SortedGuessIndex; pool: bigint },
  signal: bigint,
  commissionRate: number
): GroupSettlement {
  const extracted = extractGuess(signal);
  const winners = extracted ? group.index.nearestNeighbors(extracted.guess) : [];

  if (winners.length === 0) {
    return {
      winningGuess: extracted?.guess ?? null,
      winners: [],
      commission: 0n,
      share: 0n,
      remainder: 0n,
    };
  }

  const commission = (group.pool * BigInt(commissionRate)) / 100n;
  const pot = group.pool - commission;
  const count = BigInt(winners.length);

  return {
    winningGuess: extracted?.guess ?? null,
    winners,
    commission,
    share: pot / count,
    remainder: pot % count,
  };
}

export function isWinner(settlement: GroupSettlement, guess: number): boolean {
  return settlement.winners.includes(guess);
}

/**
 * Amount the next winning claimant receives. The remainder goes to the first
 * claimant of a split pot; a single winner's remainder is always 0.
 */
export function payoutFor(settlement: GroupSettlement, remainderClaimed: boolean): bigint {
  return remainderClaimed ? settlement.share : settlement.share + settlement.remainder;
}
