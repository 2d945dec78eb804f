import type { Address } from 'viem';
import { TransferFailedError } from './errors.js';

/**
 * Funds movements the game relies on. Each call is atomic: it either moves
 * the full amount or throws (preferably a `TransferFailedError`) and moves
 * nothing.
 */
export interface Treasury {
  /** The game's own account */
  readonly address: Address;
  /** Take `amount` from `from` into the game's account */
  receive(from: Address, amount: bigint): void;
  /** Pay `amount` from the game's account to `to` */
  send(to: Address, amount: bigint): void;
  balanceOf(account: Address): bigint;
}

/**
 * Treasury backed by an in-memory balance map
 *
 * @example
 * ```typescript
 * const treasury = new InMemoryTreasury(GAME);
 * treasury.fund(ALICE, 10n ** 18n);
 * const game = new FeeGuessGame({ ...options }, { treasury, oracle });
 * ```
 */
export class InMemoryTreasury implements Treasury {
  private balances = new Map<Address, bigint>();
  private blocked = new Set<Address>();

  constructor(readonly address: Address) {}

  /** Credit an account out of thin air */
  fund(account: Address, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  /** Make every send to `account` fail until unblocked */
  block(account: Address): void {
    this.blocked.add(account);
  }

  unblock(account: Address): void {
    this.blocked.delete(account);
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  receive(from: Address, amount: bigint): void {
    this.move(from, this.address, amount);
  }

  send(to: Address, amount: bigint): void {
    if (this.blocked.has(to)) {
      throw new TransferFailedError(to, amount, 'recipient rejected the transfer');
    }
    this.move(this.address, to, amount);
  }

  private move(from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new TransferFailedError(to, amount, 'negative amount');
    }
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new TransferFailedError(to, amount, `insufficient balance in ${from} (${available})`);
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }
}
