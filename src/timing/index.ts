/**
 * Round Timing Policy
 *
 * Rounds start every `roundLength` time steps and overlap: round n's wait
 * period coincides with round n+1's betting window. Nothing stores a round's
 * phase; every decision is derived from the current time index.
 *
 * ```
 * n:    |--- betting ---|------ wait ------|-- response window --|
 *       start(n)        +1000              +2000 = reveal(n)     +2256
 * n+1:                  |--- betting ---|------ wait ------| ...
 * ```
 */

// ============================================================================
// Constants
// ============================================================================

/** Time steps between consecutive round starts */
export const DEFAULT_ROUND_LENGTH = 1000;

/** Time steps a round accepts wagers, counted from its start */
export const DEFAULT_BETTING_WINDOW = 1000;

/** Time steps from round start to the time index whose signal decides it */
export const DEFAULT_REVEAL_DELAY = 2000;

/** Time steps after reveal during which the oracle may still answer */
export const DEFAULT_RESPONSE_WINDOW = 256;

// ============================================================================
// Types
// ============================================================================

export interface TimingConfig {
  gameStart: number;
  roundLength: number;
  bettingWindow: number;
  revealDelay: number;
  responseWindow: number;
}

/**
 * Where a round stands at a given time index
 *
 * - `UPCOMING`: before the round starts
 * - `BETTING`: wagers accepted
 * - `WAITING`: betting closed, reveal time not reached
 * - `REVEALABLE`: reveal time passed, the oracle may still answer
 * - `EXPIRED`: response window elapsed
 */
export type RoundPhase = 'UPCOMING' | 'BETTING' | 'WAITING' | 'REVEALABLE' | 'EXPIRED';

/**
 * Round timing information for display and keepers
 */
export interface RoundTiming {
  round: number;
  phase: RoundPhase;
  startsAt: number;
  bettingEndsAt: number;
  revealAt: number;
  deadline: number;
  /** Steps until betting closes (null once closed) */
  stepsUntilClose: number | null;
  /** Steps until the reveal time index passes (null once passed) */
  stepsUntilReveal: number | null;
  /** Steps until unresolved wagers become refundable (null once they are) */
  stepsUntilRefundable: number | null;
}

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * Round accepting wagers at time `t`. Requires `t ≥ gameStart`.
 */
export function roundIndex(config: TimingConfig, t: number): number {
  if (t < config.gameStart) {
    throw new RangeError(`Time ${t} is before game start ${config.gameStart}`);
  }
  return Math.floor((t - config.gameStart) / config.roundLength) + 1;
}

export function roundStart(config: TimingConfig, round: number): number {
  return config.gameStart + (round - 1) * config.roundLength;
}

/** Time index whose signal decides the round */
export function revealTime(config: TimingConfig, round: number): number {
  return roundStart(config, round) + config.revealDelay;
}

/** Last time index at which the oracle may answer for the round */
export function responseDeadline(config: TimingConfig, round: number): number {
  return revealTime(config, round) + config.responseWindow;
}

export function inBettingWindow(config: TimingConfig, round: number, t: number): boolean {
  const start = roundStart(config, round);
  return start <= t && t <= start + config.bettingWindow - 1;
}

/**
 * Round an oracle answer for `target` belongs to. Requires
 * `target ≥ gameStart + revealDelay`.
 */
export function roundForTarget(config: TimingConfig, target: number): number {
  const first = config.gameStart + config.revealDelay;
  if (target < first) {
    throw new RangeError(`Target ${target} precedes the first reveal time ${first}`);
  }
  return Math.floor((target - first) / config.roundLength) + 1;
}

export function getRoundPhase(config: TimingConfig, round: number, t: number): RoundPhase {
  const start = roundStart(config, round);
  if (t < start) return 'UPCOMING';
  if (inBettingWindow(config, round, t)) return 'BETTING';
  if (t <= revealTime(config, round)) return 'WAITING';
  if (t <= responseDeadline(config, round)) return 'REVEALABLE';
  return 'EXPIRED';
}

/**
 * Calculate round timing at time `t`.
 *
 * @example
 * ```typescript
 * const timing = describeRound(config, 3, now);
 * if (timing.phase === 'BETTING') {
 *   console.log(`Betting closes in ${timing.stepsUntilClose} steps`);
 * }
 * ```
 */
export function describeRound(config: TimingConfig, round: number, t: number): RoundTiming {
  const startsAt = roundStart(config, round);
  const bettingEndsAt = startsAt + config.bettingWindow - 1;
  const revealAt = revealTime(config, round);
  const deadline = responseDeadline(config, round);

  return {
    round,
    phase: getRoundPhase(config, round, t),
    startsAt,
    bettingEndsAt,
    revealAt,
    deadline,
    stepsUntilClose: t <= bettingEndsAt ? bettingEndsAt - t + 1 : null,
    stepsUntilReveal: t <= revealAt ? revealAt - t + 1 : null,
    stepsUntilRefundable: t <= deadline ? deadline - t + 1 : null,
  };
}

/**
 * Calculate steps remaining from current time to target time.
 */
export function stepsRemaining(current: number, target: number): number {
  return Math.max(0, target - current);
}
