/**
 * feeguess Error Classes
 *
 * Structured errors for callers of the game. Every rejection aborts its call
 * with no partial state change, so any of these can be caught and the call
 * retried with different input (or later, for `ResultPendingError`).
 */

/**
 * Broad failure class, used by hosts to decide whether a retry makes sense.
 *
 * - `input`: bad arguments, retry with different input
 * - `state`: stale or duplicate call
 * - `auth`: caller is not allowed to invoke the operation
 * - `transient`: not final yet, retry later
 * - `transfer`: a funds movement failed
 */
export type ErrorCategory = 'input' | 'state' | 'auth' | 'transient' | 'transfer';

/**
 * Base class for all feeguess errors
 */
export class FeeGuessError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Failure class */
  readonly category: ErrorCategory;
  /** HTTP status the express adapter answers with */
  readonly statusCode?: number;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    statusCode?: number,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'FeeGuessError';
    this.code = code;
    this.category = category;
    this.statusCode = statusCode;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Whether retrying the same call later can succeed */
  get retryable(): boolean {
    return this.category === 'transient';
  }

  /** Check if error is a specific type */
  static is(error: unknown): error is FeeGuessError {
    return error instanceof FeeGuessError;
  }
}

// ============================================================================
// Input rejections
// ============================================================================

export class ZeroBetError extends FeeGuessError {
  constructor() {
    super('Wager amount must be greater than zero', 'ZERO_BET', 'input', 400);
    this.name = 'ZeroBetError';
  }

  static is(error: unknown): error is ZeroBetError {
    return error instanceof ZeroBetError;
  }
}

/**
 * Deposit outside every betting window (before the game starts, or in the
 * gap a custom `bettingWindow` shorter than the round leaves).
 */
export class NotBettingPhaseError extends FeeGuessError {
  readonly at: number;
  readonly round: number | null;

  constructor(at: number, round: number | null) {
    super(
      round === null
        ? `Game has not started at time ${at}`
        : `Round ${round} is not accepting wagers at time ${at}`,
      'NOT_BETTING_PHASE',
      'input',
      400
    );
    this.name = 'NotBettingPhaseError';
    this.at = at;
    this.round = round;
  }

  static is(error: unknown): error is NotBettingPhaseError {
    return error instanceof NotBettingPhaseError;
  }
}

/**
 * No scale brings the amount into the guess range
 */
export class InvalidGuessError extends FeeGuessError {
  readonly amount: bigint;

  constructor(amount: bigint) {
    super(`Amount ${amount} does not map to a three-digit guess`, 'INVALID_GUESS', 'input', 400);
    this.name = 'InvalidGuessError';
    this.amount = amount;
  }

  static is(error: unknown): error is InvalidGuessError {
    return error instanceof InvalidGuessError;
  }
}

export class GuessOutOfRangeError extends FeeGuessError {
  readonly guess: number;

  constructor(guess: number) {
    super(`Guess ${guess} is outside [100, 999]`, 'GUESS_OUT_OF_RANGE', 'input', 400);
    this.name = 'GuessOutOfRangeError';
    this.guess = guess;
  }

  static is(error: unknown): error is GuessOutOfRangeError {
    return error instanceof GuessOutOfRangeError;
  }
}

export class GuessTakenError extends FeeGuessError {
  readonly round: number;
  readonly scale: number;
  readonly guess: number;

  constructor(round: number, scale: number, guess: number) {
    super(
      `Guess ${guess} is already taken in round ${round}, group ${scale}`,
      'GUESS_TAKEN',
      'input',
      409
    );
    this.name = 'GuessTakenError';
    this.round = round;
    this.scale = scale;
    this.guess = guess;
  }

  static is(error: unknown): error is GuessTakenError {
    return error instanceof GuessTakenError;
  }
}

/**
 * The oracle record could not be decoded into a signal
 */
export class InvalidSignalRecordError extends FeeGuessError {
  constructor(message: string, cause?: Error) {
    super(message, 'INVALID_SIGNAL_RECORD', 'input', 400, cause);
    this.name = 'InvalidSignalRecordError';
  }

  static is(error: unknown): error is InvalidSignalRecordError {
    return error instanceof InvalidSignalRecordError;
  }
}

export class InvalidAddressError extends FeeGuessError {
  readonly value: string;

  constructor(value: string) {
    super(`${value} is not an address`, 'INVALID_ADDRESS', 'input', 400);
    this.name = 'InvalidAddressError';
    this.value = value;
  }

  static is(error: unknown): error is InvalidAddressError {
    return error instanceof InvalidAddressError;
  }
}

/**
 * Operation stamped with a time index earlier than one the game already
 * acted on. Time only moves forward.
 */
export class TimeRegressionError extends FeeGuessError {
  readonly at: number;
  readonly latest: number;

  constructor(at: number, latest: number) {
    super(`Time ${at} precedes time ${latest} already observed`, 'TIME_REGRESSION', 'input', 400);
    this.name = 'TimeRegressionError';
    this.at = at;
    this.latest = latest;
  }

  static is(error: unknown): error is TimeRegressionError {
    return error instanceof TimeRegressionError;
  }
}

export class InvalidConfigError extends FeeGuessError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG', 'input');
    this.name = 'InvalidConfigError';
  }

  static is(error: unknown): error is InvalidConfigError {
    return error instanceof InvalidConfigError;
  }
}

// ============================================================================
// State preconditions
// ============================================================================

export class AlreadySettledError extends FeeGuessError {
  readonly status: 'claimed' | 'withdrawn';

  constructor(bettor: string, index: number, status: 'claimed' | 'withdrawn') {
    super(`Wager ${index} of ${bettor} is already ${status}`, 'ALREADY_SETTLED', 'state', 409);
    this.name = 'AlreadySettledError';
    this.status = status;
  }

  static is(error: unknown): error is AlreadySettledError {
    return error instanceof AlreadySettledError;
  }
}

/**
 * A round's signal is set once
 */
export class AlreadySetError extends FeeGuessError {
  readonly round: number;

  constructor(round: number) {
    super(`Signal for round ${round} is already set`, 'ALREADY_SET', 'state', 409);
    this.name = 'AlreadySetError';
    this.round = round;
  }

  static is(error: unknown): error is AlreadySetError {
    return error instanceof AlreadySetError;
  }
}

export class InvalidWagerReferenceError extends FeeGuessError {
  constructor(bettor: string, index: number) {
    super(`Bettor ${bettor} has no wager ${index}`, 'INVALID_WAGER_REFERENCE', 'state', 404);
    this.name = 'InvalidWagerReferenceError';
  }

  static is(error: unknown): error is InvalidWagerReferenceError {
    return error instanceof InvalidWagerReferenceError;
  }
}

/**
 * Signal arrived after the round's response window closed. By then every
 * wager in the round is refundable, so the signal can no longer be used.
 */
export class SignalExpiredError extends FeeGuessError {
  readonly round: number;
  readonly deadline: number;

  constructor(round: number, deadline: number) {
    super(
      `Signal for round ${round} arrived after its deadline ${deadline}`,
      'SIGNAL_EXPIRED',
      'state',
      409
    );
    this.name = 'SignalExpiredError';
    this.round = round;
    this.deadline = deadline;
  }

  static is(error: unknown): error is SignalExpiredError {
    return error instanceof SignalExpiredError;
  }
}

/**
 * Signal submitted before its target time index has passed
 */
export class PrematureSignalError extends FeeGuessError {
  readonly targetTime: number;

  constructor(targetTime: number, at: number) {
    super(
      `Signal for time ${targetTime} cannot be known at time ${at}`,
      'PREMATURE_SIGNAL',
      'state',
      409
    );
    this.name = 'PrematureSignalError';
    this.targetTime = targetTime;
  }

  static is(error: unknown): error is PrematureSignalError {
    return error instanceof PrematureSignalError;
  }
}

// ============================================================================
// Authorization
// ============================================================================

export class UnauthorizedCallerError extends FeeGuessError {
  readonly caller: string;

  constructor(caller: string) {
    super(`Caller ${caller} may not submit signals`, 'UNAUTHORIZED_CALLER', 'auth', 403);
    this.name = 'UnauthorizedCallerError';
    this.caller = caller;
  }

  static is(error: unknown): error is UnauthorizedCallerError {
    return error instanceof UnauthorizedCallerError;
  }
}

// ============================================================================
// Transient
// ============================================================================

/**
 * Round result not known yet; the oracle may still answer.
 *
 * @example
 * ```typescript
 * try {
 *   game.claim({ bettor, wager: 0, at });
 * } catch (e) {
 *   if (ResultPendingError.is(e)) {
 *     console.log(`Retry after time ${e.retryAfter}`);
 *   }
 * }
 * ```
 */
export class ResultPendingError extends FeeGuessError {
  readonly round: number;
  /** Time index after which the wager becomes refundable if no signal arrives */
  readonly retryAfter: number;

  constructor(round: number, retryAfter: number) {
    super(`Result for round ${round} is pending`, 'RESULT_PENDING', 'transient', 425);
    this.name = 'ResultPendingError';
    this.round = round;
    this.retryAfter = retryAfter;
  }

  static is(error: unknown): error is ResultPendingError {
    return error instanceof ResultPendingError;
  }
}

// ============================================================================
// Transfers
// ============================================================================

export class TransferFailedError extends FeeGuessError {
  readonly to: string;
  readonly amount: bigint;

  constructor(to: string, amount: bigint, reason: string, cause?: Error) {
    super(`Transfer of ${amount} to ${to} failed: ${reason}`, 'TRANSFER_FAILED', 'transfer', 502, cause);
    this.name = 'TransferFailedError';
    this.to = to;
    this.amount = amount;
  }

  static is(error: unknown): error is TransferFailedError {
    return error instanceof TransferFailedError;
  }
}

/**
 * Normalize anything thrown into a FeeGuessError
 */
export function toFeeGuessError(error: unknown): FeeGuessError {
  if (FeeGuessError.is(error)) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return new FeeGuessError(cause.message, 'INTERNAL', 'state', 500, cause);
}
