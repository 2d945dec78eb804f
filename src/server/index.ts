/**
 * Server-side adapters for feeguess
 *
 * HTTP routes over a game, and a single event stream fanned out to SSE clients.
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { Broadcaster, bridgeGameEvents, createGameRouter, expressSSE } from 'feeguess/server';
 *
 * const broadcaster = new Broadcaster();
 * bridgeGameEvents(game, broadcaster);
 *
 * const app = express();
 * app.use('/game', createGameRouter(game, { clock: () => latestBlock }));
 * app.get('/events', expressSSE(broadcaster));
 * ```
 *
 * @packageDocumentation
 */

// Main exports
export { createGameRouter, createGameHandlers, InvalidRequestError, type GameHandlers } from './routes.js';
export { expressSSE, bridgeGameEvents, GAME_EVENTS } from './express-sse.js';
export { Broadcaster } from './broadcaster.js';
export { toJson } from './serialize.js';

// Types
export type {
  BroadcasterOptions,
  ExpressSSEOptions,
  GameRouterOptions,
  ClientConnection,
  ErrorBody,
} from './types.js';
