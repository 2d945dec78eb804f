import type { Address, Hex } from 'viem';
import type { SortedGuessIndex } from './guess/sorted-guess-index.js';

export type WagerStatus = 'pending' | 'claimed' | 'withdrawn';

/**
 * A recorded wager. Never deleted; `status` leaves `pending` exactly once.
 */
export interface Wager {
  /** Position in the bettor's wager list, used as the claim reference */
  readonly index: number;
  readonly bettor: Address;
  readonly round: number;
  readonly scale: number;
  readonly guess: number;
  /** Original amount, refunded in full on withdrawal */
  readonly amount: bigint;
  readonly placedAt: number;
  status: WagerStatus;
  /** Amount paid out on claim or withdrawal (0 for a losing claim) */
  payout: bigint;
  settledAt: number | null;
}

/**
 * Winner computation for one group, fixed by its first claim after the
 * round's signal is known.
 */
export interface GroupSettlement {
  /** Guess derived from the signal, null if the signal maps to none */
  readonly winningGuess: number | null;
  /** 0, 1 or 2 guesses, ascending */
  readonly winners: readonly number[];
  readonly commission: bigint;
  /** Per-winner share */
  readonly share: bigint;
  /** Odd unit of a split pot, paid to the first winning claimant */
  readonly remainder: bigint;
}

/**
 * Wagers of one round and one scale class
 */
export interface GuessGroup {
  readonly round: number;
  readonly scale: number;
  readonly index: SortedGuessIndex;
  readonly bettorOf: Map<number, Address>;
  /** Amount still held for each guess */
  readonly amountOf: Map<number, bigint>;
  pool: bigint;
  settlement: GroupSettlement | null;
  commissionTaken: boolean;
  remainderClaimed: boolean;
}

export interface Round {
  readonly index: number;
  /** Revealed signal, null while unknown. Set once. */
  signal: bigint | null;
  signalRequested: boolean;
  readonly groups: Map<number, GuessGroup>;
}

// ============================================================================
// Operation inputs and results
// ============================================================================

export interface DepositRequest {
  bettor: Address;
  amount: bigint;
  /** Current time index */
  at: number;
}

export interface ClaimRequest {
  bettor: Address;
  /** Wager index in the bettor's list */
  wager: number;
  at: number;
}

export interface SignalSubmission {
  caller: Address;
  /** Time index the record belongs to */
  targetTime: number;
  /** RLP-encoded block header */
  record: Hex;
  at: number;
}

export type ClaimOutcome = 'won' | 'lost' | 'refunded';

export interface ClaimResult {
  outcome: ClaimOutcome;
  /** Amount transferred to the bettor */
  amount: bigint;
  wager: Wager;
}

// ============================================================================
// Read views
// ============================================================================

export interface GroupSummary {
  round: number;
  scale: number;
  pool: bigint;
  guesses: number[];
  settled: boolean;
  winners: number[] | null;
  winningGuess: number | null;
  commissionTaken: boolean;
}

export interface RoundSummary {
  round: number;
  signal: bigint | null;
  signalRequested: boolean;
  scales: number[];
}

// ============================================================================
// Events
// ============================================================================

export interface BetPlacedPayload {
  bettor: Address;
  index: number;
  round: number;
  scale: number;
  guess: number;
  amount: bigint;
}

export interface SignalRequestedPayload {
  round: number;
  scale: number;
  targetTime: number;
  fee: bigint;
}

export interface SignalReceivedPayload {
  round: number;
  targetTime: number;
  signal: bigint;
}

export interface GroupSettledPayload {
  round: number;
  scale: number;
  winningGuess: number | null;
  winners: number[];
  commission: bigint;
  share: bigint;
}

export interface ClaimedPayload {
  bettor: Address;
  index: number;
  round: number;
  scale: number;
  guess: number;
  amount: bigint;
  won: boolean;
}

export interface WithdrawnPayload {
  bettor: Address;
  index: number;
  round: number;
  scale: number;
  amount: bigint;
  reason: 'no-signal' | 'no-winner';
}

export interface CommissionPayload {
  round: number;
  scale: number;
  operator: Address;
  amount: bigint;
}

export interface FeeGuessGameEvents {
  betPlaced: (payload: BetPlacedPayload) => void;
  signalRequested: (payload: SignalRequestedPayload) => void;
  signalReceived: (payload: SignalReceivedPayload) => void;
  groupSettled: (payload: GroupSettledPayload) => void;
  claimed: (payload: ClaimedPayload) => void;
  withdrawn: (payload: WithdrawnPayload) => void;
  commissionPaid: (payload: CommissionPayload) => void;
  commissionFailed: (payload: CommissionPayload & { error: Error }) => void;
}

export type FeeGuessGameEventName = keyof FeeGuessGameEvents;
