import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { FeeGuessGame } from '../game.js';
import type { FeeGuessGameEventName } from '../types.js';
import type { Broadcaster } from './broadcaster.js';
import type { ExpressSSEOptions } from './types.js';

/** Every event the game emits */
export const GAME_EVENTS = [
  'betPlaced',
  'signalRequested',
  'signalReceived',
  'groupSettled',
  'claimed',
  'withdrawn',
  'commissionPaid',
  'commissionFailed',
] as const satisfies readonly FeeGuessGameEventName[];

/**
 * Forward game events to every SSE client of the broadcaster.
 *
 * @returns a function that detaches the listeners
 */
export function bridgeGameEvents(
  game: FeeGuessGame,
  broadcaster: Broadcaster,
  events: readonly FeeGuessGameEventName[] = GAME_EVENTS
): () => void {
  const detach: Array<() => void> = [];
  for (const event of events) {
    const listener = (payload: unknown) => {
      broadcaster.broadcast(event, payload);
    };
    game.on(event, listener);
    detach.push(() => game.off(event, listener));
  }
  return () => {
    for (const off of detach) off();
  };
}

/**
 * Express middleware for SSE connections to the game's event stream
 *
 * Sets up SSE headers, registers the client with the broadcaster, and handles
 * cleanup on disconnect. Wire the broadcaster to the game once with
 * `bridgeGameEvents`.
 *
 * @example
 * ```typescript
 * const broadcaster = new Broadcaster();
 * bridgeGameEvents(game, broadcaster);
 *
 * app.get('/events', expressSSE(broadcaster, {
 *   headers: { 'Access-Control-Allow-Origin': '*' },
 * }));
 * ```
 */
export function expressSSE(broadcaster: Broadcaster, options?: ExpressSSEOptions): RequestHandler {
  return (req: Request, res: Response, _next: NextFunction): void => {
    try {
      broadcaster.addClient(res);
    } catch (error) {
      // Max clients reached
      res.status(503).json({
        error: 'Service temporarily unavailable',
        message: error instanceof Error ? error.message : 'Too many connections',
      });
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering

    // Apply custom headers (e.g., CORS)
    if (options?.headers) {
      for (const [key, value] of Object.entries(options.headers)) {
        res.setHeader(key, value);
      }
    }

    // Disable response timeout
    req.setTimeout(0);
    res.setTimeout(0);

    res.flushHeaders();

    req.on('close', () => {
      broadcaster.removeClient(res);
    });

    req.on('error', () => {
      broadcaster.removeClient(res);
    });

    // Keep connection open (don't call next() or res.end())
  };
}
