import { getAddress, isAddress, type Address } from 'viem';
import { InvalidConfigError } from './errors.js';
import {
  DEFAULT_BETTING_WINDOW,
  DEFAULT_RESPONSE_WINDOW,
  DEFAULT_REVEAL_DELAY,
  DEFAULT_ROUND_LENGTH,
  type TimingConfig,
} from './timing/index.js';

/** Percent of a group's pool paid to the operator on its first winning claim */
export const DEFAULT_COMMISSION_RATE = 1;

/** Fee paid to the oracle per signal request (0.001 in 18-decimal units) */
export const DEFAULT_ORACLE_FEE = 10n ** 15n;

/**
 * Options accepted by `FeeGuessGame`
 */
export interface FeeGuessGameOptions {
  /** Time index at which round 1 opens (immutable) */
  gameStart: number;
  /** The only identity allowed to submit signals (immutable) */
  oracle: Address;
  /** Commission recipient */
  operator: Address;
  /** Integer percent in [0, 100] (default: 1) */
  commissionRate?: number;
  /** Oracle request fee (default: 10^15) */
  oracleFee?: bigint;
  /** Round geometry overrides */
  timing?: Partial<Omit<TimingConfig, 'gameStart'>>;
}

/**
 * Validated, frozen game configuration
 */
export interface GameConfig {
  readonly oracle: Address;
  readonly operator: Address;
  readonly commissionRate: number;
  readonly oracleFee: bigint;
  readonly timing: Readonly<TimingConfig>;
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Checksummed form of an address, null if `value` is not one
 */
export function parseAddress(value: string): Address | null {
  return isAddress(value, { strict: false }) ? getAddress(value) : null;
}

function address(name: string, value: string): Address {
  const parsed = parseAddress(value);
  if (!parsed) {
    throw new InvalidConfigError(`${name} must be an address, got ${value}`);
  }
  return parsed;
}

export function resolveConfig(options: FeeGuessGameOptions): GameConfig {
  const { gameStart, commissionRate = DEFAULT_COMMISSION_RATE, oracleFee = DEFAULT_ORACLE_FEE } =
    options;

  if (!Number.isSafeInteger(gameStart) || gameStart < 0) {
    throw new InvalidConfigError(`gameStart must be a non-negative integer, got ${gameStart}`);
  }
  if (!Number.isInteger(commissionRate) || commissionRate < 0 || commissionRate > 100) {
    throw new InvalidConfigError(`commissionRate must be an integer in [0, 100], got ${commissionRate}`);
  }
  if (oracleFee < 0n) {
    throw new InvalidConfigError(`oracleFee must not be negative, got ${oracleFee}`);
  }

  const timing: TimingConfig = {
    gameStart,
    roundLength: positiveInteger('timing.roundLength', options.timing?.roundLength ?? DEFAULT_ROUND_LENGTH),
    bettingWindow: positiveInteger(
      'timing.bettingWindow',
      options.timing?.bettingWindow ?? DEFAULT_BETTING_WINDOW
    ),
    revealDelay: positiveInteger('timing.revealDelay', options.timing?.revealDelay ?? DEFAULT_REVEAL_DELAY),
    responseWindow: positiveInteger(
      'timing.responseWindow',
      options.timing?.responseWindow ?? DEFAULT_RESPONSE_WINDOW
    ),
  };

  // Betting must close before the round's reveal time, and windows may not overlap
  if (timing.bettingWindow > timing.roundLength) {
    throw new InvalidConfigError('timing.bettingWindow must not exceed timing.roundLength');
  }
  if (timing.revealDelay < timing.bettingWindow) {
    throw new InvalidConfigError('timing.revealDelay must not be shorter than timing.bettingWindow');
  }

  return Object.freeze({
    oracle: address('oracle', options.oracle),
    operator: address('operator', options.operator),
    commissionRate,
    oracleFee,
    timing: Object.freeze(timing),
  });
}
