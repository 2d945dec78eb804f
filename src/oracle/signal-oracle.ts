import type { Address } from 'viem';

/**
 * External service delivering block headers.
 *
 * `requestSignal` only files the request; the answer arrives later through
 * `FeeGuessGame.submitSignal`, called by the oracle's own address. The fee
 * has already been paid to `address` when `requestSignal` runs.
 */
export interface SignalOracle {
  readonly address: Address;
  requestSignal(targetTime: number, fee: bigint): void;
}
