import type { Address } from 'viem';
import type { Wager } from '../types.js';

/**
 * Per-bettor wager lists. A wager's position in its bettor's list is the
 * reference used to claim it.
 */
export class WagerBook {
  /** In-memory storage: bettor -> wagers in placement order */
  private wagers = new Map<Address, Wager[]>();

  /**
   * Append a pending wager and return it
   */
  add(entry: Omit<Wager, 'index' | 'status' | 'payout' | 'settledAt'>): Wager {
    const existing = this.wagers.get(entry.bettor) ?? [];
    const wager: Wager = {
      ...entry,
      index: existing.length,
      status: 'pending',
      payout: 0n,
      settledAt: null,
    };
    existing.push(wager);
    this.wagers.set(entry.bettor, existing);
    return wager;
  }

  get(bettor: Address, index: number): Wager | undefined {
    if (!Number.isInteger(index) || index < 0) return undefined;
    return this.wagers.get(bettor)?.[index];
  }

  /**
   * All wagers of a bettor, oldest first
   */
  list(bettor: Address): readonly Wager[] {
    return this.wagers.get(bettor) ?? [];
  }

  /**
   * Get statistics
   */
  getStats(): { bettorCount: number; totalWagers: number; pending: number } {
    let totalWagers = 0;
    let pending = 0;
    for (const list of this.wagers.values()) {
      totalWagers += list.length;
      pending += list.filter((w) => w.status === 'pending').length;
    }
    return { bettorCount: this.wagers.size, totalWagers, pending };
  }
}
