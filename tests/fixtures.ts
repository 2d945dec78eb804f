import { numberToHex, toRlp, type Address, type Hex } from 'viem';
import type { FeeGuessGameOptions } from '../src/config.js';
import { FeeGuessGame } from '../src/game.js';
import type { SignalOracle } from '../src/oracle/signal-oracle.js';
import { InMemoryTreasury } from '../src/treasury.js';

export const ORACLE: Address = '0x1111111111111111111111111111111111111111';
export const OPERATOR: Address = '0x2222222222222222222222222222222222222222';
export const ALICE: Address = '0x3333333333333333333333333333333333333333';
export const BOB: Address = '0x4444444444444444444444444444444444444444';
export const CAROL: Address = '0x5555555555555555555555555555555555555555';
export const DAVE: Address = '0x6666666666666666666666666666666666666666';
export const GAME: Address = '0x9999999999999999999999999999999999999999';

/** 10^18, one whole unit */
export const UNIT = 10n ** 18n;

/** Game account balance kept for oracle fees */
export const FEE_RESERVE = 10n ** 16n;

/** Starting balance of every bettor */
export const BANKROLL = 10n * UNIT;

export const GWEI = 1_000_000_000n;

/**
 * RLP block header with `baseFee` in field 15 and one trailing field
 */
export function encodeHeader(baseFee: bigint, fieldCount = 17): Hex {
  const fields: Hex[] = [];
  for (let i = 0; i < fieldCount; i++) {
    if (i === 15) {
      fields.push(baseFee === 0n ? '0x' : numberToHex(baseFee));
    } else {
      fields.push(numberToHex(i + 1));
    }
  }
  return toRlp(fields);
}

/**
 * Oracle stub recording every request
 */
export class RecordingOracle implements SignalOracle {
  readonly address: Address = ORACLE;
  readonly requests: Array<{ targetTime: number; fee: bigint }> = [];

  requestSignal(targetTime: number, fee: bigint): void {
    this.requests.push({ targetTime, fee });
  }
}

/**
 * Game starting at time 1000 with funded bettors and a fee reserve
 */
export function createTestGame(
  overrides: Partial<FeeGuessGameOptions> = {},
  treasury: InMemoryTreasury = new InMemoryTreasury(GAME)
) {
  const oracle = new RecordingOracle();
  treasury.fund(GAME, FEE_RESERVE);
  for (const bettor of [ALICE, BOB, CAROL, DAVE]) {
    treasury.fund(bettor, BANKROLL);
  }
  const game = new FeeGuessGame(
    { gameStart: 1000, oracle: ORACLE, operator: OPERATOR, ...overrides },
    { treasury, oracle }
  );
  return { game, treasury, oracle };
}
