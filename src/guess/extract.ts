/** Amounts and signals use 18 fractional digits */
export const FIXED_POINT = 10n ** 18n;

export const MIN_GUESS = 100;
export const MAX_GUESS = 999;

/** Number of scales tried; a scale is the power of ten applied before truncation */
export const MAX_SCALE = 18;

export interface ExtractedGuess {
  /** Three-digit guess in [MIN_GUESS, MAX_GUESS] */
  guess: number;
  /** Scale class in [0, MAX_SCALE); wagers only compete within one scale */
  scale: number;
}

/**
 * Map a raw value to its three-digit guess.
 *
 * Tries `value · 10^scale / 10^18` for scale 0, 1, ... and returns the first
 * result in [100, 999]. Returns null when the value is already above 999 at
 * scale 0, or when no scale below 18 reaches 100.
 *
 * @example
 * ```typescript
 * extractGuess(3n * 10n ** 17n);     // { guess: 300, scale: 3 } (0.3)
 * extractGuess(30_000_000_000n);     // { guess: 300, scale: 10 } (30 gwei)
 * extractGuess(1000n * 10n ** 18n);  // null
 * ```
 */
export function extractGuess(value: bigint): ExtractedGuess | null {
  if (value <= 0n) return null;

  let scaled = value;
  for (let scale = 0; scale < MAX_SCALE; scale++) {
    const candidate = scaled / FIXED_POINT;
    if (candidate > BigInt(MAX_GUESS)) return null;
    if (candidate >= BigInt(MIN_GUESS)) {
      return { guess: Number(candidate), scale };
    }
    scaled *= 10n;
  }
  return null;
}

export function isGuessInRange(guess: number): boolean {
  return Number.isInteger(guess) && guess >= MIN_GUESS && guess <= MAX_GUESS;
}
