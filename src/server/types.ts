import type { Response } from 'express';

/**
 * Configuration options for the SSE broadcaster
 */
export interface BroadcasterOptions {
  maxClients?: number; // Default: 1000
  clientTimeout?: number; // Default: 60000ms (no successful write)
  pingInterval?: number; // Default: 15000ms, 0 disables
}

/**
 * Express SSE middleware options
 */
export interface ExpressSSEOptions {
  headers?: Record<string, string>;
}

/**
 * Options for the game router
 */
export interface GameRouterOptions {
  /** Current time index (block number) */
  clock: () => number;
}

/**
 * Client connection state
 */
export interface ClientConnection {
  id: string;
  response: Response;
  connectedAt: number;
  lastActivityAt: number;
}

/**
 * Body of every error answer
 */
export interface ErrorBody {
  error: string;
  message: string;
}
