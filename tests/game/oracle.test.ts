import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  AlreadySetError,
  InvalidSignalRecordError,
  PrematureSignalError,
  ResultPendingError,
  SignalExpiredError,
  TimeRegressionError,
  TransferFailedError,
  UnauthorizedCallerError,
} from '../../src/errors.js';
import type { FeeGuessGame } from '../../src/game.js';
import type { InMemoryTreasury } from '../../src/treasury.js';
import type { SignalReceivedPayload } from '../../src/types.js';
import {
  ALICE,
  BOB,
  GAME,
  GWEI,
  ORACLE,
  RecordingOracle,
  createTestGame,
  encodeHeader,
} from '../fixtures.js';

const SIGNAL = 309n * GWEI / 10n;

describe('FeeGuessGame oracle handshake', () => {
  let game: FeeGuessGame;
  let treasury: InMemoryTreasury;
  let oracle: RecordingOracle;

  beforeEach(() => {
    ({ game, treasury, oracle } = createTestGame());
    game.deposit({ bettor: ALICE, amount: 3n * 10n ** 17n, at: 1200 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('requestSignal', () => {
    it('does nothing until the reveal time has passed', () => {
      expect(game.requestSignal(1, 3, 3000)).toBe(false);
      expect(oracle.requests).toEqual([]);
    });

    it('requests the reveal time once', () => {
      expect(game.requestSignal(1, 3, 3001)).toBe(true);
      expect(game.requestSignal(1, 3, 3002)).toBe(false);
      expect(oracle.requests).toEqual([{ targetTime: 3000, fee: 10n ** 15n }]);
    });

    it('does nothing after the response window', () => {
      expect(game.requestSignal(1, 3, 3257)).toBe(false);
    });

    it('does nothing for an empty group', () => {
      expect(game.requestSignal(1, 7, 3100)).toBe(false);
      expect(game.requestSignal(2, 3, 4100)).toBe(false);
      expect(game.getRound(2)).toBeNull();
    });

    it('does nothing once the signal is known', () => {
      game.submitSignal({ caller: ORACLE, targetTime: 3000, record: encodeHeader(SIGNAL), at: 3001 });
      expect(game.requestSignal(1, 3, 3002)).toBe(false);
    });

    it('skips the fee transfer for a free oracle', () => {
      ({ game, treasury, oracle } = createTestGame({ oracleFee: 0n }));
      game.deposit({ bettor: ALICE, amount: 3n * 10n ** 17n, at: 1200 });

      expect(game.requestSignal(1, 3, 3100)).toBe(true);
      expect(oracle.requests).toEqual([{ targetTime: 3000, fee: 0n }]);
      expect(treasury.balanceOf(ORACLE)).toBe(0n);
    });

    it('propagates a failed fee transfer and allows a retry', () => {
      treasury.block(ORACLE);
      expect(() => game.requestSignal(1, 3, 3100)).toThrow(TransferFailedError);
      expect(game.getRound(1)?.signalRequested).toBe(false);

      treasury.unblock(ORACLE);
      expect(game.requestSignal(1, 3, 3100)).toBe(true);
    });

    it('pays the fee from the game account, not the pool', () => {
      const before = treasury.balanceOf(GAME);
      game.requestSignal(1, 3, 3100);
      expect(treasury.balanceOf(GAME)).toBe(before - 10n ** 15n);
      expect(game.getGroup(1, 3)?.pool).toBe(3n * 10n ** 17n);
    });
  });

  describe('submitSignal', () => {
    it('stores the decoded base fee for the round of the target', () => {
      const received: SignalReceivedPayload[] = [];
      game.on('signalReceived', (payload) => received.push(payload));

      const signal = game.submitSignal({
        caller: ORACLE,
        targetTime: 3000,
        record: encodeHeader(SIGNAL),
        at: 3100,
      });

      expect(signal).toBe(SIGNAL);
      expect(game.getRound(1)?.signal).toBe(SIGNAL);
      expect(received).toEqual([{ round: 1, targetTime: 3000, signal: SIGNAL }]);
    });

    it('maps any target inside a round period to that round', () => {
      game.submitSignal({ caller: ORACLE, targetTime: 3200, record: encodeHeader(SIGNAL), at: 3201 });
      expect(game.getRound(1)?.signal).toBe(SIGNAL);
    });

    it('accepts a signal for a round without wagers', () => {
      game.submitSignal({ caller: ORACLE, targetTime: 4000, record: encodeHeader(SIGNAL), at: 4001 });
      expect(game.getRound(2)).toEqual({ round: 2, signal: SIGNAL, signalRequested: false, scales: [] });
    });

    it('only accepts the configured oracle', () => {
      expect(() =>
        game.submitSignal({ caller: BOB, targetTime: 3000, record: encodeHeader(SIGNAL), at: 3100 })
      ).toThrow(UnauthorizedCallerError);
      expect(game.getRound(1)?.signal).toBeNull();
    });

    it('rejects targets before the first reveal time', () => {
      expect(() =>
        game.submitSignal({ caller: ORACLE, targetTime: 2999, record: encodeHeader(SIGNAL), at: 3100 })
      ).toThrow(InvalidSignalRecordError);
    });

    it('sets a round signal only once', () => {
      game.submitSignal({ caller: ORACLE, targetTime: 3000, record: encodeHeader(SIGNAL), at: 3100 });

      expect(() =>
        game.submitSignal({ caller: ORACLE, targetTime: 3000, record: encodeHeader(40n * GWEI), at: 3101 })
      ).toThrow(AlreadySetError);
      expect(game.getRound(1)?.signal).toBe(SIGNAL);
    });

    it('rejects a signal after the response window', () => {
      expect(() =>
        game.submitSignal({ caller: ORACLE, targetTime: 3000, record: encodeHeader(SIGNAL), at: 3257 })
      ).toThrow(SignalExpiredError);
      expect(game.getRound(1)?.signal).toBeNull();
    });

    it('rejects a malformed record without storing anything', () => {
      expect(() =>
        game.submitSignal({ caller: ORACLE, targetTime: 4000, record: '0x2a', at: 4100 })
      ).toThrow(InvalidSignalRecordError);
      expect(game.getRound(2)).toBeNull();
    });

    it('rejects an answer before its target time has passed', () => {
      expect(() =>
        game.submitSignal({ caller: ORACLE, targetTime: 3000, record: encodeHeader(SIGNAL), at: 3000 })
      ).toThrow(PrematureSignalError);
      expect(game.getRound(1)?.signal).toBeNull();
    });

    it('leaves the signal unknown for a zero base fee', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      expect(
        game.submitSignal({ caller: ORACLE, targetTime: 3000, record: encodeHeader(0n), at: 3100 })
      ).toBe(0n);

      expect(game.getRound(1)?.signal).toBeNull();
      expect(warn).toHaveBeenCalledWith('[FeeGuessGame] Zero base fee for round 1 ignored, signal stays unknown');
      expect(() => game.claim({ bettor: ALICE, wager: 0, at: 3150 })).toThrow(ResultPendingError);

      game.submitSignal({ caller: ORACLE, targetTime: 3000, record: encodeHeader(SIGNAL), at: 3200 });
      expect(game.getRound(1)?.signal).toBe(SIGNAL);
    });

    it('cannot settle a round that was already refunded', () => {
      game.claim({ bettor: ALICE, wager: 0, at: 3300 });

      expect(() =>
        game.submitSignal({ caller: ORACLE, targetTime: 3000, record: encodeHeader(SIGNAL), at: 3100 })
      ).toThrow(TimeRegressionError);
      expect(game.getRound(1)?.signal).toBeNull();
    });
  });
});
