/**
 * feeguess
 *
 * A parimutuel guessing game on a future block's base fee. Wager amounts
 * encode the guess; the nearest guess in each group wins the pool.
 *
 * @example
 * ```typescript
 * import { FeeGuessGame, InMemoryTreasury } from 'feeguess';
 *
 * const game = new FeeGuessGame(
 *   { gameStart: 1_000, oracle: ORACLE, operator: OPERATOR },
 *   { treasury: new InMemoryTreasury(GAME), oracle: headerOracle },
 * );
 *
 * game.deposit({ bettor: ALICE, amount: 3n * 10n ** 17n, at: 1_200 });
 * ```
 *
 * @packageDocumentation
 */

// Game
export { FeeGuessGame, createFeeGuessGame, type FeeGuessGameDeps } from './game.js';
export {
  DEFAULT_COMMISSION_RATE,
  DEFAULT_ORACLE_FEE,
  parseAddress,
  resolveConfig,
  type FeeGuessGameOptions,
  type GameConfig,
} from './config.js';

// Errors
export {
  FeeGuessError,
  ZeroBetError,
  NotBettingPhaseError,
  InvalidGuessError,
  GuessOutOfRangeError,
  GuessTakenError,
  InvalidSignalRecordError,
  InvalidAddressError,
  TimeRegressionError,
  InvalidConfigError,
  AlreadySettledError,
  AlreadySetError,
  InvalidWagerReferenceError,
  SignalExpiredError,
  PrematureSignalError,
  UnauthorizedCallerError,
  ResultPendingError,
  TransferFailedError,
  toFeeGuessError,
  type ErrorCategory,
} from './errors.js';

// Timing
export {
  DEFAULT_ROUND_LENGTH,
  DEFAULT_BETTING_WINDOW,
  DEFAULT_REVEAL_DELAY,
  DEFAULT_RESPONSE_WINDOW,
  roundIndex,
  roundStart,
  revealTime,
  responseDeadline,
  inBettingWindow,
  roundForTarget,
  getRoundPhase,
  describeRound,
  stepsRemaining,
  type TimingConfig,
  type RoundPhase,
  type RoundTiming,
} from './timing/index.js';

// Guesses
export {
  FIXED_POINT,
  MIN_GUESS,
  MAX_GUESS,
  MAX_SCALE,
  extractGuess,
  isGuessInRange,
  type ExtractedGuess,
} from './guess/extract.js';
export { SortedGuessIndex } from './guess/sorted-guess-index.js';

// Ledger
export { RoundLedger } from './ledger/round-ledger.js';
export { WagerBook } from './ledger/wager-book.js';

// Oracle
export { BASE_FEE_FIELD, decodeBaseFee } from './oracle/header-record.js';
export type { SignalOracle } from './oracle/signal-oracle.js';

// Settlement
export { settleGroup, isWinner, payoutFor } from './settlement/settlement.js';

// Funds
export { InMemoryTreasury, type Treasury } from './treasury.js';

// Types
export type {
  WagerStatus,
  Wager,
  GroupSettlement,
  GuessGroup,
  Round,
  DepositRequest,
  ClaimRequest,
  SignalSubmission,
  ClaimOutcome,
  ClaimResult,
  GroupSummary,
  RoundSummary,
  BetPlacedPayload,
  SignalRequestedPayload,
  SignalReceivedPayload,
  GroupSettledPayload,
  ClaimedPayload,
  WithdrawnPayload,
  CommissionPayload,
  FeeGuessGameEvents,
  FeeGuessGameEventName,
} from './types.js';
