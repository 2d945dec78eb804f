import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Request, Response } from 'express';
import type { FeeGuessGame } from '../../src/game.js';
import { createGameHandlers, createGameRouter, type GameHandlers } from '../../src/server/routes.js';
import { ALICE, BOB, GWEI, ORACLE, createTestGame, encodeHeader } from '../fixtures.js';

function createExchange(input: { body?: unknown; params?: Record<string, string> }) {
  const res = {
    status: vi.fn().mockReturnThis(),
    type: vi.fn().mockReturnThis(),
    send: vi.fn(),
    end: vi.fn(),
  };
  return {
    res,
    request: { body: input.body, params: input.params ?? {} } as unknown as Request,
    response: res as unknown as Response,
    /** Parsed JSON body of the answer */
    body(): unknown {
      const [payload] = res.send.mock.calls[0] ?? [];
      return typeof payload === 'string' ? JSON.parse(payload) : undefined;
    },
  };
}

describe('game routes', () => {
  let game: FeeGuessGame;
  let handlers: GameHandlers;
  let now: number;

  function call(handler: keyof GameHandlers, input: { body?: unknown; params?: Record<string, string> }) {
    const exchange = createExchange(input);
    handlers[handler](exchange.request, exchange.response, () => undefined);
    return exchange;
  }

  beforeEach(() => {
    ({ game } = createTestGame());
    now = 1200;
    handlers = createGameHandlers(game, { clock: () => now });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds an express router', () => {
    expect(typeof createGameRouter(game, { clock: () => now })).toBe('function');
  });

  describe('POST /bets', () => {
    it('places a wager at the clock time', () => {
      const exchange = call('placeBet', { body: { bettor: ALICE, amount: '300000000000000000' } });

      expect(exchange.res.status).toHaveBeenCalledWith(201);
      expect(exchange.res.type).toHaveBeenCalledWith('application/json');
      expect(exchange.body()).toEqual({
        index: 0,
        bettor: ALICE,
        round: 1,
        scale: 3,
        guess: 300,
        amount: '300000000000000000',
        placedAt: 1200,
        status: 'pending',
        payout: '0',
        settledAt: null,
      });
    });

    it('rejects a numeric amount', () => {
      const exchange = call('placeBet', { body: { bettor: ALICE, amount: 0.3 } });

      expect(exchange.res.status).toHaveBeenCalledWith(400);
      expect(exchange.body()).toEqual({
        error: 'INVALID_REQUEST',
        message: 'amount must be a decimal integer string',
      });
    });

    it('rejects a missing body', () => {
      const exchange = call('placeBet', {});
      expect(exchange.body()).toEqual({
        error: 'INVALID_REQUEST',
        message: 'Request body must be a JSON object',
      });
    });

    it('maps game errors to their status', () => {
      call('placeBet', { body: { bettor: ALICE, amount: '300000000000000000' } });
      const taken = call('placeBet', { body: { bettor: BOB, amount: '300000000000000000' } });
      const zero = call('placeBet', { body: { bettor: BOB, amount: '0' } });

      expect(taken.res.status).toHaveBeenCalledWith(409);
      expect(taken.body()).toEqual({
        error: 'GUESS_TAKEN',
        message: 'Guess 300 is already taken in round 1, group 3',
      });
      expect(zero.res.status).toHaveBeenCalledWith(400);
    });
  });

  describe('POST /claims', () => {
    beforeEach(() => {
      call('placeBet', { body: { bettor: ALICE, amount: '300000000000000000' } });
    });

    it('answers 425 while the result is pending', () => {
      now = 3100;
      const exchange = call('claim', { body: { bettor: ALICE, wager: 0 } });

      expect(exchange.res.status).toHaveBeenCalledWith(425);
      expect(exchange.body()).toEqual({ error: 'RESULT_PENDING', message: 'Result for round 1 is pending' });
    });

    it('returns the claim result', () => {
      now = 3300;
      const exchange = call('claim', { body: { bettor: ALICE, wager: '0' } });

      expect(exchange.res.status).toHaveBeenCalledWith(200);
      expect(exchange.body()).toMatchObject({ outcome: 'refunded', amount: '300000000000000000' });
    });

    it('rejects a negative wager reference', () => {
      const exchange = call('claim', { body: { bettor: ALICE, wager: -1 } });
      expect(exchange.res.status).toHaveBeenCalledWith(400);
    });
  });

  describe('oracle routes', () => {
    beforeEach(() => {
      call('placeBet', { body: { bettor: ALICE, amount: '300000000000000000' } });
      now = 3100;
    });

    it('requests a signal', () => {
      const exchange = call('requestSignal', { params: { round: '1', scale: '3' } });
      expect(exchange.body()).toEqual({ requested: true });
    });

    it('accepts a signal with no content', () => {
      const exchange = call('submitSignal', {
        body: { caller: ORACLE, targetTime: 3000, record: encodeHeader(309n * GWEI / 10n) },
      });

      expect(exchange.res.status).toHaveBeenCalledWith(204);
      expect(exchange.res.end).toHaveBeenCalledTimes(1);
      expect(game.getRound(1)?.signal).toBe(309n * GWEI / 10n);
    });

    it('answers 403 to another caller', () => {
      const exchange = call('submitSignal', {
        body: { caller: BOB, targetTime: 3000, record: encodeHeader(1n) },
      });
      expect(exchange.res.status).toHaveBeenCalledWith(403);
    });
  });

  describe('read routes', () => {
    beforeEach(() => {
      call('placeBet', { body: { bettor: ALICE, amount: '300000000000000000' } });
    });

    it('returns a round with its timing', () => {
      const exchange = call('getRound', { params: { round: '1' } });

      expect(exchange.body()).toEqual({
        summary: { round: 1, signal: null, signalRequested: false, scales: [3] },
        timing: {
          round: 1,
          phase: 'BETTING',
          startsAt: 1000,
          bettingEndsAt: 1999,
          revealAt: 3000,
          deadline: 3256,
          stepsUntilClose: 800,
          stepsUntilReveal: 1801,
          stepsUntilRefundable: 2057,
        },
      });
    });

    it('answers 404 for an empty group', () => {
      const exchange = call('getGroup', { params: { round: '1', scale: '7' } });
      expect(exchange.res.status).toHaveBeenCalledWith(404);
      expect(exchange.body()).toEqual({ error: 'NOT_FOUND', message: 'No wagers in this group' });
    });

    it('lists wagers of a bettor', () => {
      const exchange = call('getWagers', { params: { address: ALICE } });
      expect(exchange.body()).toEqual([expect.objectContaining({ guess: 300, amount: '300000000000000000' })]);
    });

    it('rejects a malformed address', () => {
      const exchange = call('getWagers', { params: { address: 'alice' } });
      expect(exchange.res.status).toHaveBeenCalledWith(400);
    });

    it('answers 500 and logs unexpected failures', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(game, 'getRound').mockImplementation(() => {
        throw new Error('ledger unavailable');
      });

      const exchange = call('getRound', { params: { round: '1' } });

      expect(exchange.res.status).toHaveBeenCalledWith(500);
      expect(exchange.body()).toEqual({ error: 'INTERNAL', message: 'ledger unavailable' });
      expect(error).toHaveBeenCalledTimes(1);
    });
  });
});
