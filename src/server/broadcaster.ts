import { EventEmitter } from 'eventemitter3';
import type { Response } from 'express';
import { toJson } from './serialize.js';
import type { BroadcasterOptions, ClientConnection } from './types.js';

/** How often idle clients are swept */
const SWEEP_INTERVAL = 10_000;

interface BroadcasterEvents {
  clientConnected: (clientId: string) => void;
  clientDisconnected: (clientId: string) => void;
}

/**
 * Fans game events out to SSE clients.
 *
 * A client is identified by its response stream. It is dropped when a write
 * to it throws, and closed when nothing reached it for `clientTimeout`
 * (pings do not count).
 */
export class Broadcaster extends EventEmitter<BroadcasterEvents> {
  private readonly clients = new Map<Response, ClientConnection>();
  private readonly maxClients: number;
  private readonly clientTimeout: number;
  private readonly timers: NodeJS.Timeout[] = [];
  private nextId = 1;

  constructor(options: BroadcasterOptions = {}) {
    super();
    this.maxClients = options.maxClients ?? 1000;
    this.clientTimeout = options.clientTimeout ?? 60_000;

    this.timers.push(setInterval(() => this.sweep(), SWEEP_INTERVAL));
    const pingInterval = options.pingInterval ?? 15_000;
    if (pingInterval > 0) {
      this.timers.push(setInterval(() => this.ping(), pingInterval));
    }
  }

  /**
   * Register a response stream
   *
   * @returns the client's id
   */
  addClient(res: Response): string {
    const existing = this.clients.get(res);
    if (existing) return existing.id;
    if (this.clients.size >= this.maxClients) {
      throw new Error(`Max clients (${this.maxClients}) reached`);
    }
    const id = `client-${this.nextId++}`;
    const now = Date.now();
    this.clients.set(res, { id, response: res, connectedAt: now, lastActivityAt: now });
    this.emit('clientConnected', id);
    return id;
  }

  removeClient(res: Response): void {
    const client = this.clients.get(res);
    if (!client) return;
    this.clients.delete(res);
    this.emit('clientDisconnected', client.id);
  }

  /**
   * Write one `event:`/`data:` frame to every client
   *
   * @returns number of clients the frame reached
   */
  broadcast(event: string, data: unknown): number {
    return this.write(`event: ${event}\ndata: ${toJson(data)}\n\n`, true);
  }

  /** Keep-alive comment frame */
  ping(): void {
    this.write(`: ping ${Date.now()}\n\n`, false);
  }

  getClientCount(): number {
    return this.clients.size;
  }

  /**
   * Stop the timers and end every connection
   */
  stop(): void {
    for (const timer of this.timers.splice(0)) {
      clearInterval(timer);
    }
    for (const res of [...this.clients.keys()]) {
      this.close(res);
    }
  }

  private write(frame: string, activity: boolean): number {
    let reached = 0;
    for (const client of [...this.clients.values()]) {
      try {
        client.response.write(frame);
      } catch {
        // Stream already gone
        this.removeClient(client.response);
        continue;
      }
      if (activity) client.lastActivityAt = Date.now();
      reached++;
    }
    return reached;
  }

  private sweep(): void {
    const cutoff = Date.now() - this.clientTimeout;
    for (const client of [...this.clients.values()]) {
      if (client.lastActivityAt < cutoff) this.close(client.response);
    }
  }

  private close(res: Response): void {
    this.removeClient(res);
    try {
      res.end();
    } catch (error) {
      console.warn('[Broadcaster] Failed to end client stream:', error);
    }
  }
}
