import { EventEmitter } from 'eventemitter3';
import type { Address } from 'viem';
import { parseAddress, resolveConfig, type FeeGuessGameOptions, type GameConfig } from './config.js';
import {
  AlreadySetError,
  AlreadySettledError,
  GuessOutOfRangeError,
  GuessTakenError,
  InvalidAddressError,
  InvalidConfigError,
  InvalidGuessError,
  InvalidSignalRecordError,
  InvalidWagerReferenceError,
  NotBettingPhaseError,
  PrematureSignalError,
  ResultPendingError,
  SignalExpiredError,
  TimeRegressionError,
  TransferFailedError,
  UnauthorizedCallerError,
  ZeroBetError,
} from './errors.js';
import { extractGuess, isGuessInRange } from './guess/extract.js';
import { RoundLedger } from './ledger/round-ledger.js';
import { WagerBook } from './ledger/wager-book.js';
import { decodeBaseFee } from './oracle/header-record.js';
import type { SignalOracle } from './oracle/signal-oracle.js';
import { isWinner, payoutFor, settleGroup } from './settlement/settlement.js';
import {
  describeRound,
  inBettingWindow,
  responseDeadline,
  revealTime,
  roundForTarget,
  roundIndex,
  type RoundTiming,
} from './timing/index.js';
import type { Treasury } from './treasury.js';
import type {
  ClaimRequest,
  ClaimResult,
  DepositRequest,
  FeeGuessGameEvents,
  GroupSettlement,
  GroupSummary,
  GuessGroup,
  RoundSummary,
  SignalSubmission,
  Wager,
  WithdrawnPayload,
} from './types.js';

/**
 * Collaborators the game moves funds and requests signals through
 */
export interface FeeGuessGameDeps {
  treasury: Treasury;
  oracle: SignalOracle;
}

/**
 * What one claim changed in its group, undone if its transfer fails. Only
 * this call's own effects are reversed: a claim nested in the transfer keeps
 * its deductions.
 */
interface ClaimEffects {
  /** Total taken out of the pool by this call */
  deducted: bigint;
  tookCommission: boolean;
  tookRemainder: boolean;
}

/**
 * FeeGuessGame - rounds, wagers, oracle handshake and settlement
 *
 * Every operation is synchronous and runs to completion before the next one
 * starts; rejections leave the state exactly as it was. The caller supplies
 * the current time index (`at`) on every call, and it must never go back:
 * an operation stamped earlier than one already applied throws
 * `TimeRegressionError`.
 *
 * @example
 * ```typescript
 * const game = new FeeGuessGame(
 *   { gameStart: 1_000, oracle: ORACLE, operator: OPERATOR },
 *   { treasury, oracle: headerOracle },
 * );
 *
 * game.on('claimed', ({ bettor, amount, won }) => {
 *   if (won) console.log(`${bettor} won ${amount}`);
 * });
 *
 * const wager = game.deposit({ bettor: ALICE, amount: 3n * 10n ** 17n, at: 1_200 });
 * // ... oracle answers through game.submitSignal(...)
 * game.claim({ bettor: ALICE, wager: wager.index, at: 3_300 });
 * ```
 */
export class FeeGuessGame extends EventEmitter<FeeGuessGameEvents> {
  readonly config: GameConfig;
  private readonly treasury: Treasury;
  private readonly oracle: SignalOracle;
  private readonly ledger = new RoundLedger();
  private readonly book = new WagerBook();
  /** Latest time index an applied operation carried */
  private latestAt = Number.NEGATIVE_INFINITY;

  constructor(options: FeeGuessGameOptions, deps: FeeGuessGameDeps) {
    super();
    this.config = resolveConfig(options);
    if (parseAddress(deps.oracle.address) !== this.config.oracle) {
      throw new InvalidConfigError(
        `Oracle collaborator ${deps.oracle.address} does not match configured oracle ${this.config.oracle}`
      );
    }
    this.treasury = deps.treasury;
    this.oracle = deps.oracle;
  }

  // ==========================================================================
  // Deposits
  // ==========================================================================

  /**
   * Place a wager. The amount itself encodes the guess and its group.
   */
  deposit(request: DepositRequest): Wager {
    const { amount, at } = request;
    const bettor = this.requireAddress(request.bettor);
    const timing = this.config.timing;
    this.checkTime(at);

    if (amount <= 0n) {
      throw new ZeroBetError();
    }
    if (at < timing.gameStart) {
      throw new NotBettingPhaseError(at, null);
    }
    const round = roundIndex(timing, at);
    if (!inBettingWindow(timing, round, at)) {
      throw new NotBettingPhaseError(at, round);
    }

    const extracted = extractGuess(amount);
    if (!extracted) {
      throw new InvalidGuessError(amount);
    }
    const { guess, scale } = extracted;
    if (!isGuessInRange(guess)) {
      throw new GuessOutOfRangeError(guess);
    }
    if (this.ledger.peekGroup(round, scale)?.index.has(guess)) {
      throw new GuessTakenError(round, scale, guess);
    }

    // Funds first: a failed receive leaves no trace in the ledger
    this.treasury.receive(bettor, amount);

    const group = this.ledger.group(round, scale);
    group.bettorOf.set(guess, bettor);
    group.amountOf.set(guess, amount);
    group.pool += amount;
    group.index.insert(guess);

    const wager = this.book.add({ bettor, round, scale, guess, amount, placedAt: at });
    this.advanceTime(at);
    this.emit('betPlaced', { bettor, index: wager.index, round, scale, guess, amount });

    // A round's own reveal time is always after its betting window, so only
    // earlier rounds (n-2 with default timing) can be due for a request here
    for (let earlier = round - 1; earlier >= 1; earlier--) {
      if (at > responseDeadline(timing, earlier)) break;
      this.tryRequestSignal(earlier, scale, at);
    }

    return { ...wager };
  }

  // ==========================================================================
  // Oracle handshake
  // ==========================================================================

  /**
   * Request the signal for a round if its reveal time has passed, the
   * response window is still open, no signal or request exists yet, and the
   * group's pool covers the oracle fee. The fee comes out of the game's own
   * balance, not the pool's accounting.
   *
   * @returns true if a request was issued by this call
   */
  requestSignal(round: number, scale: number, at: number): boolean {
    const timing = this.config.timing;
    this.checkTime(at);
    const target = revealTime(timing, round);
    if (at <= target || at > responseDeadline(timing, round)) {
      return false;
    }

    const state = this.ledger.peekRound(round);
    const group = this.ledger.peekGroup(round, scale);
    if (!state || !group || state.signal !== null || state.signalRequested) {
      return false;
    }

    const fee = this.config.oracleFee;
    if (group.pool < fee) {
      return false;
    }

    state.signalRequested = true;
    try {
      if (fee > 0n) {
        this.treasury.send(this.oracle.address, fee);
      }
      this.oracle.requestSignal(target, fee);
    } catch (error) {
      state.signalRequested = false;
      throw error;
    }

    this.advanceTime(at);
    this.emit('signalRequested', { round, scale, targetTime: target, fee });
    return true;
  }

  private tryRequestSignal(round: number, scale: number, at: number): void {
    try {
      this.requestSignal(round, scale, at);
    } catch (error) {
      console.warn(`[FeeGuessGame] Signal request for round ${round} failed:`, error);
    }
  }

  /**
   * Oracle callback: store the base fee decoded from the header recorded at
   * `targetTime`. Only the configured oracle may call it, once per round, and
   * only after `targetTime` has passed.
   *
   * A zero base fee means "unknown": nothing is stored and the round keeps
   * waiting for another answer or its deadline.
   *
   * @returns the decoded base fee
   */
  submitSignal(submission: SignalSubmission): bigint {
    const { caller, targetTime, record, at } = submission;
    const timing = this.config.timing;

    if (parseAddress(caller) !== this.config.oracle) {
      throw new UnauthorizedCallerError(caller);
    }
    this.checkTime(at);
    if (targetTime < timing.gameStart + timing.revealDelay) {
      throw new InvalidSignalRecordError(`Target ${targetTime} precedes the first reveal time`);
    }
    if (at <= targetTime) {
      throw new PrematureSignalError(targetTime, at);
    }

    const round = roundForTarget(timing, targetTime);
    if (this.ledger.peekRound(round)?.signal != null) {
      throw new AlreadySetError(round);
    }
    const deadline = responseDeadline(timing, round);
    if (at > deadline) {
      throw new SignalExpiredError(round, deadline);
    }

    const signal = decodeBaseFee(record);
    if (signal === 0n) {
      console.warn(`[FeeGuessGame] Zero base fee for round ${round} ignored, signal stays unknown`);
      return signal;
    }
    this.ledger.round(round).signal = signal;
    this.advanceTime(at);

    this.emit('signalReceived', { round, targetTime, signal });
    return signal;
  }

  // ==========================================================================
  // Claims
  // ==========================================================================

  /**
   * Resolve one wager to a payout, a zero-payout loss, or a refund.
   *
   * Throws `ResultPendingError` while the oracle may still answer. A failed
   * payout or refund transfer reverts what this call changed (a group
   * settlement computed along the way stays) and throws
   * `TransferFailedError`. A failed commission transfer is logged and
   * does not fail the claim.
   */
  claim(request: ClaimRequest): ClaimResult {
    const { at } = request;
    const bettor = this.requireAddress(request.bettor);

    const wager = this.book.get(bettor, request.wager);
    if (!wager) {
      throw new InvalidWagerReferenceError(bettor, request.wager);
    }
    if (wager.status !== 'pending') {
      throw new AlreadySettledError(bettor, wager.index, wager.status);
    }
    this.checkTime(at);

    const round = this.ledger.round(wager.round);
    const group = this.ledger.group(wager.round, wager.scale);

    if (round.signal === null) {
      const deadline = responseDeadline(this.config.timing, wager.round);
      if (at > deadline) {
        return this.refund(wager, group, at, 'no-signal');
      }
      throw new ResultPendingError(wager.round, deadline + 1);
    }

    // Settlement depends only on the group's deposits and the signal, so it
    // stays cached even if this claim's transfer fails
    let settlement = group.settlement;
    if (!settlement) {
      settlement = settleGroup(group, round.signal, this.config.commissionRate);
      group.settlement = settlement;
      this.emitSettled(group, settlement);
    }

    if (settlement.winners.length === 0) {
      return this.refund(wager, group, at, 'no-winner');
    }

    // Terminal state before any transfer: a re-entrant call sees a settled wager
    this.settleWager(wager, group, at);

    if (!isWinner(settlement, wager.guess)) {
      wager.payout = 0n;
      this.advanceTime(at);
      this.emit('claimed', { ...this.wagerFields(wager), amount: 0n, won: false });
      return { outcome: 'lost', amount: 0n, wager: { ...wager } };
    }

    const effects: ClaimEffects = { deducted: 0n, tookCommission: false, tookRemainder: false };
    if (!group.commissionTaken) {
      group.commissionTaken = true;
      effects.tookCommission = true;
    }
    const commission = effects.tookCommission ? settlement.commission : 0n;
    const amount = payoutFor(settlement, group.remainderClaimed);
    effects.tookRemainder = !group.remainderClaimed;
    group.remainderClaimed = true;
    effects.deducted = commission + amount;
    group.pool -= effects.deducted;
    wager.payout = amount;

    this.transferOrRollback(bettor, amount, wager, group, effects);
    this.advanceTime(at);
    if (commission > 0n) {
      this.payCommission(group, commission);
    }

    this.emit('claimed', { ...this.wagerFields(wager), amount, won: true });
    return { outcome: 'won', amount, wager: { ...wager } };
  }

  private refund(
    wager: Wager,
    group: GuessGroup,
    at: number,
    reason: WithdrawnPayload['reason']
  ): ClaimResult {
    this.settleWager(wager, group, at, 'withdrawn');
    wager.payout = wager.amount;
    group.pool -= wager.amount;

    this.transferOrRollback(wager.bettor, wager.amount, wager, group, {
      deducted: wager.amount,
      tookCommission: false,
      tookRemainder: false,
    });
    this.advanceTime(at);

    this.emit('withdrawn', {
      bettor: wager.bettor,
      index: wager.index,
      round: wager.round,
      scale: wager.scale,
      amount: wager.amount,
      reason,
    });
    return { outcome: 'refunded', amount: wager.amount, wager: { ...wager } };
  }

  private settleWager(
    wager: Wager,
    group: GuessGroup,
    at: number,
    status: 'claimed' | 'withdrawn' = 'claimed'
  ): void {
    wager.status = status;
    wager.settledAt = at;
    group.amountOf.set(wager.guess, 0n);
  }

  private payCommission(group: GuessGroup, amount: bigint): void {
    const payload = { round: group.round, scale: group.scale, operator: this.config.operator, amount };
    try {
      this.treasury.send(this.config.operator, amount);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      console.warn(
        `[FeeGuessGame] Commission transfer for round ${group.round}, group ${group.scale} failed:`,
        cause.message
      );
      this.emit('commissionFailed', { ...payload, error: cause });
      return;
    }
    this.emit('commissionPaid', payload);
  }

  private transferOrRollback(
    to: Address,
    amount: bigint,
    wager: Wager,
    group: GuessGroup,
    effects: ClaimEffects
  ): void {
    if (amount === 0n) return;
    try {
      this.treasury.send(to, amount);
    } catch (error) {
      this.rollback(wager, group, effects);
      if (TransferFailedError.is(error)) throw error;
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new TransferFailedError(to, amount, cause.message, cause);
    }
  }

  /**
   * Undo one claim. The wager itself was pending before the call, and the
   * group gets back exactly what this call took from it.
   */
  private rollback(wager: Wager, group: GuessGroup, effects: ClaimEffects): void {
    wager.status = 'pending';
    wager.payout = 0n;
    wager.settledAt = null;
    group.amountOf.set(wager.guess, wager.amount);
    group.pool += effects.deducted;
    if (effects.tookCommission) group.commissionTaken = false;
    if (effects.tookRemainder) group.remainderClaimed = false;
  }

  private checkTime(at: number): void {
    if (at < this.latestAt) {
      throw new TimeRegressionError(at, this.latestAt);
    }
  }

  private advanceTime(at: number): void {
    if (at > this.latestAt) this.latestAt = at;
  }

  private emitSettled(group: GuessGroup, settlement: GroupSettlement): void {
    this.emit('groupSettled', {
      round: group.round,
      scale: group.scale,
      winningGuess: settlement.winningGuess,
      winners: [...settlement.winners],
      commission: settlement.commission,
      share: settlement.share,
    });
  }

  private wagerFields(wager: Wager) {
    return {
      bettor: wager.bettor,
      index: wager.index,
      round: wager.round,
      scale: wager.scale,
      guess: wager.guess,
    };
  }

  private requireAddress(value: string): Address {
    const parsed = parseAddress(value);
    if (!parsed) {
      throw new InvalidAddressError(value);
    }
    return parsed;
  }

  // ==========================================================================
  // Read views
  // ==========================================================================

  /**
   * Round accepting wagers at `at`, or null before the game starts
   */
  currentRound(at: number): number | null {
    return at < this.config.timing.gameStart ? null : roundIndex(this.config.timing, at);
  }

  getTiming(round: number, at: number): RoundTiming {
    return describeRound(this.config.timing, round, at);
  }

  getRound(round: number): RoundSummary | null {
    return this.ledger.summarizeRound(round);
  }

  getGroup(round: number, scale: number): GroupSummary | null {
    return this.ledger.summarizeGroup(round, scale);
  }

  getWagers(bettor: Address): Wager[] {
    return this.book.list(this.requireAddress(bettor)).map((wager) => ({ ...wager }));
  }

  getWager(bettor: Address, index: number): Wager | null {
    const wager = this.book.get(this.requireAddress(bettor), index);
    return wager ? { ...wager } : null;
  }

  /**
   * Get statistics
   */
  getStats(): { rounds: number; bettors: number; wagers: number; pendingWagers: number } {
    const { bettorCount, totalWagers, pending } = this.book.getStats();
    return { rounds: this.ledger.size, bettors: bettorCount, wagers: totalWagers, pendingWagers: pending };
  }
}

/**
 * Create a FeeGuessGame instance
 */
export function createFeeGuessGame(options: FeeGuessGameOptions, deps: FeeGuessGameDeps): FeeGuessGame {
  return new FeeGuessGame(options, deps);
}
