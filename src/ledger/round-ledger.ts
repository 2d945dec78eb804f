import { SortedGuessIndex } from '../guess/sorted-guess-index.js';
import type { GroupSummary, GuessGroup, Round, RoundSummary } from '../types.js';

/**
 * Rounds keyed by index, groups keyed by scale within a round.
 *
 * Entries are created on first write access and never enumerated by the
 * game; `peek*` reads leave the ledger untouched.
 */
export class RoundLedger {
  private rounds = new Map<number, Round>();

  /**
   * Get a round, creating it if needed
   */
  round(index: number): Round {
    let round = this.rounds.get(index);
    if (!round) {
      round = { index, signal: null, signalRequested: false, groups: new Map() };
      this.rounds.set(index, round);
    }
    return round;
  }

  /**
   * Get a group, creating it (and its round) if needed
   */
  group(roundIndex: number, scale: number): GuessGroup {
    const round = this.round(roundIndex);
    let group = round.groups.get(scale);
    if (!group) {
      group = {
        round: roundIndex,
        scale,
        index: new SortedGuessIndex(),
        bettorOf: new Map(),
        amountOf: new Map(),
        pool: 0n,
        settlement: null,
        commissionTaken: false,
        remainderClaimed: false,
      };
      round.groups.set(scale, group);
    }
    return group;
  }

  peekRound(index: number): Round | undefined {
    return this.rounds.get(index);
  }

  peekGroup(roundIndex: number, scale: number): GuessGroup | undefined {
    return this.rounds.get(roundIndex)?.groups.get(scale);
  }

  summarizeRound(index: number): RoundSummary | null {
    const round = this.rounds.get(index);
    if (!round) return null;
    return {
      round: index,
      signal: round.signal,
      signalRequested: round.signalRequested,
      scales: Array.from(round.groups.keys()).sort((a, b) => a - b),
    };
  }

  summarizeGroup(roundIndex: number, scale: number): GroupSummary | null {
    const group = this.peekGroup(roundIndex, scale);
    if (!group) return null;
    return {
      round: roundIndex,
      scale,
      pool: group.pool,
      guesses: group.index.toArray(),
      settled: group.settlement !== null,
      winners: group.settlement ? [...group.settlement.winners] : null,
      winningGuess: group.settlement?.winningGuess ?? null,
      commissionTaken: group.commissionTaken,
    };
  }

  /**
   * Number of rounds touched so far
   */
  get size(): number {
    return this.rounds.size;
  }
}
