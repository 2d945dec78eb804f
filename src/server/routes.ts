import express, { type Request, type RequestHandler, type Response, type Router } from 'express';
import { isHex, type Address, type Hex } from 'viem';
import { FeeGuessError, toFeeGuessError } from '../errors.js';
import type { FeeGuessGame } from '../game.js';
import { toJson } from './serialize.js';
import type { ErrorBody, GameRouterOptions } from './types.js';

/**
 * Malformed HTTP request body or path parameter
 */
export class InvalidRequestError extends FeeGuessError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST', 'input', 400);
    this.name = 'InvalidRequestError';
  }

  static is(error: unknown): error is InvalidRequestError {
    return error instanceof InvalidRequestError;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (!isPlainObject(body)) {
    throw new InvalidRequestError('Request body must be a JSON object');
  }
  return body;
}

function stringField(body: Record<string, unknown>, name: string): string {
  const value = body[name];
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidRequestError(`${name} must be a non-empty string`);
  }
  return value;
}

function addressField(body: Record<string, unknown>, name: string): Address {
  const value = stringField(body, name);
  if (!isHex(value)) {
    throw new InvalidRequestError(`${name} must be a 0x-prefixed address`);
  }
  return value;
}

function hexField(body: Record<string, unknown>, name: string): Hex {
  const value = stringField(body, name);
  if (!isHex(value)) {
    throw new InvalidRequestError(`${name} must be 0x-prefixed hex`);
  }
  return value;
}

/** Amounts travel as decimal strings (18 fractional digits) */
function amountField(body: Record<string, unknown>, name: string): bigint {
  const value = body[name];
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new InvalidRequestError(`${name} must be a decimal integer string`);
  }
  return BigInt(value);
}

function integer(value: unknown, name: string): number {
  const parsed =
    typeof value === 'number' ? value : typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new InvalidRequestError(`${name} must be a non-negative integer`);
  }
  return parsed;
}

function send(res: Response, status: number, body: unknown): void {
  res.status(status).type('application/json').send(toJson(body));
}

/**
 * Run an operation and answer with its result, or with the mapped error
 */
function respond(res: Response, status: number, run: () => unknown): void {
  try {
    const result = run();
    if (result === undefined) {
      res.status(status).end();
      return;
    }
    send(res, status, result);
  } catch (error) {
    const failure = toFeeGuessError(error);
    if (failure.code === 'INTERNAL') {
      console.error('[GameRouter] Unexpected error:', error);
    }
    const body: ErrorBody = { error: failure.code, message: failure.message };
    send(res, failure.statusCode ?? 500, body);
  }
}

export interface GameHandlers {
  placeBet: RequestHandler;
  claim: RequestHandler;
  submitSignal: RequestHandler;
  requestSignal: RequestHandler;
  getRound: RequestHandler;
  getGroup: RequestHandler;
  getWagers: RequestHandler;
}

/**
 * Request handlers over a game, stamped with the clock's time index
 */
export function createGameHandlers(game: FeeGuessGame, options: GameRouterOptions): GameHandlers {
  const { clock } = options;

  return {
    placeBet: (req, res) =>
      respond(res, 201, () => {
        const body = bodyOf(req);
        return game.deposit({
          bettor: addressField(body, 'bettor'),
          amount: amountField(body, 'amount'),
          at: clock(),
        });
      }),

    claim: (req, res) =>
      respond(res, 200, () => {
        const body = bodyOf(req);
        return game.claim({
          bettor: addressField(body, 'bettor'),
          wager: integer(body.wager, 'wager'),
          at: clock(),
        });
      }),

    submitSignal: (req, res) =>
      respond(res, 204, () => {
        const body = bodyOf(req);
        game.submitSignal({
          caller: addressField(body, 'caller'),
          targetTime: integer(body.targetTime, 'targetTime'),
          record: hexField(body, 'record'),
          at: clock(),
        });
        return undefined;
      }),

    requestSignal: (req, res) =>
      respond(res, 200, () => ({
        requested: game.requestSignal(
          integer(req.params.round, 'round'),
          integer(req.params.scale, 'scale'),
          clock()
        ),
      })),

    getRound: (req, res) =>
      respond(res, 200, () => {
        const round = integer(req.params.round, 'round');
        return {
          summary: game.getRound(round),
          timing: game.getTiming(round, clock()),
        };
      }),

    getGroup: (req, res) =>
      respond(res, 200, () => {
        const group = game.getGroup(integer(req.params.round, 'round'), integer(req.params.scale, 'scale'));
        if (!group) {
          throw new FeeGuessError('No wagers in this group', 'NOT_FOUND', 'state', 404);
        }
        return group;
      }),

    getWagers: (req, res) =>
      respond(res, 200, () => {
        const address = req.params.address;
        if (address === undefined || !isHex(address)) {
          throw new InvalidRequestError('address must be a 0x-prefixed address');
        }
        return game.getWagers(address);
      }),
  };
}

/**
 * Express router exposing the game over HTTP
 *
 * @example
 * ```typescript
 * const app = express();
 * app.use('/game', createGameRouter(game, { clock: () => latestBlock }));
 * ```
 */
export function createGameRouter(game: FeeGuessGame, options: GameRouterOptions): Router {
  const handlers = createGameHandlers(game, options);
  const router = express.Router();

  router.use(express.json());
  router.post('/bets', handlers.placeBet);
  router.post('/claims', handlers.claim);
  router.post('/signals', handlers.submitSignal);
  router.post('/rounds/:round/groups/:scale/request', handlers.requestSignal);
  router.get('/rounds/:round', handlers.getRound);
  router.get('/rounds/:round/groups/:scale', handlers.getGroup);
  router.get('/bettors/:address/wagers', handlers.getWagers);

  return router;
}
