/**
 * Ascending, duplicate-free list of the guesses placed in one group.
 *
 * Lookups are binary searches. Insertion shifts the tail, which is bounded by
 * the 900 possible guesses and happens once per wager, never per claim.
 */
export class SortedGuessIndex {
  private readonly guesses: number[] = [];

  /**
   * First position whose guess is ≥ key (the list length if none is)
   */
  lowerBound(key: number): number {
    let low = 0;
    let high = this.guesses.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const value = this.guesses[mid];
      if (value !== undefined && value < key) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }

  has(guess: number): boolean {
    return this.guesses[this.lowerBound(guess)] === guess;
  }

  /**
   * Insert a guess. Returns false (and leaves the index unchanged) if it is
   * already present.
   */
  insert(guess: number): boolean {
    const position = this.lowerBound(guess);
    if (this.guesses[position] === guess) return false;
    this.guesses.splice(position, 0, guess);
    return true;
  }

  /**
   * Guesses closest to `key`.
   *
   * Returns [] for an empty index, the single closer neighbor otherwise, and
   * both neighbors in ascending order when they are equally close. An exact
   * match is its own right neighbor and always wins alone.
   */
  nearestNeighbors(key: number): number[] {
    const low = this.lowerBound(key);
    const left = low > 0 ? this.guesses[low - 1] : undefined;
    const right = this.guesses[low];

    if (left === undefined && right === undefined) return [];
    if (left === undefined) return right === undefined ? [] : [right];
    if (right === undefined) return [left];

    const leftDistance = key - left;
    const rightDistance = right - key;
    if (leftDistance < rightDistance) return [left];
    if (rightDistance < leftDistance) return [right];
    return [left, right];
  }

  get size(): number {
    return this.guesses.length;
  }

  toArray(): number[] {
    return [...this.guesses];
  }
}
