import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import type { FeeGuessGame } from '../../src/game.js';
import { Broadcaster } from '../../src/server/broadcaster.js';
import { GAME_EVENTS, bridgeGameEvents, expressSSE } from '../../src/server/express-sse.js';
import { ALICE, createTestGame } from '../fixtures.js';

function createConnection() {
  const listeners = new Map<string, () => void>();
  const req = {
    setTimeout: vi.fn(),
    on: vi.fn((event: string, listener: () => void) => {
      listeners.set(event, listener);
    }),
  };
  const res = {
    setHeader: vi.fn(),
    setTimeout: vi.fn(),
    flushHeaders: vi.fn(),
    status: vi.fn().mockReturnThis(),
    json: vi.fn(),
    write: vi.fn(),
    end: vi.fn(),
  };
  return {
    req,
    res,
    listeners,
    request: req as unknown as Request,
    response: res as unknown as Response,
  };
}

const next: NextFunction = () => undefined;

describe('expressSSE', () => {
  let broadcaster: Broadcaster;

  beforeEach(() => {
    broadcaster = new Broadcaster({ pingInterval: 0 });
  });

  afterEach(() => {
    broadcaster.stop();
  });

  it('opens an event stream and registers the client', () => {
    const connection = createConnection();

    expressSSE(broadcaster, { headers: { 'Access-Control-Allow-Origin': '*' } })(
      connection.request,
      connection.response,
      next
    );

    expect(connection.res.setHeader).toHaveBeenCalledWith('Content-Type', 'text/event-stream');
    expect(connection.res.setHeader).toHaveBeenCalledWith('Access-Control-Allow-Origin', '*');
    expect(connection.res.flushHeaders).toHaveBeenCalledTimes(1);
    expect(broadcaster.getClientCount()).toBe(1);
  });

  it('unregisters the client when the request closes', () => {
    const connection = createConnection();
    expressSSE(broadcaster)(connection.request, connection.response, next);

    connection.listeners.get('close')?.();

    expect(broadcaster.getClientCount()).toBe(0);
  });

  it('answers 503 before any SSE header when full', () => {
    broadcaster.stop();
    broadcaster = new Broadcaster({ maxClients: 0, pingInterval: 0 });
    const connection = createConnection();

    expressSSE(broadcaster)(connection.request, connection.response, next);

    expect(connection.res.status).toHaveBeenCalledWith(503);
    expect(connection.res.json).toHaveBeenCalledWith({
      error: 'Service temporarily unavailable',
      message: 'Max clients (0) reached',
    });
    expect(connection.res.setHeader).not.toHaveBeenCalled();
  });
});

describe('bridgeGameEvents', () => {
  let broadcaster: Broadcaster;
  let game: FeeGuessGame;

  beforeEach(() => {
    broadcaster = new Broadcaster({ pingInterval: 0 });
    ({ game } = createTestGame());
  });

  afterEach(() => {
    broadcaster.stop();
  });

  it('covers every game event', () => {
    expect(GAME_EVENTS).toHaveLength(8);
  });

  it('forwards game events until detached', () => {
    const connection = createConnection();
    broadcaster.addClient(connection.response);
    const detach = bridgeGameEvents(game, broadcaster);

    game.deposit({ bettor: ALICE, amount: 3n * 10n ** 17n, at: 1200 });

    expect(connection.res.write).toHaveBeenCalledWith(
      'event: betPlaced\ndata: {"bettor":"0x3333333333333333333333333333333333333333","index":0,' +
        '"round":1,"scale":3,"guess":300,"amount":"300000000000000000"}\n\n'
    );

    detach();
    game.deposit({ bettor: ALICE, amount: 31n * 10n ** 16n, at: 1300 });
    expect(connection.res.write).toHaveBeenCalledTimes(1);
  });
});
