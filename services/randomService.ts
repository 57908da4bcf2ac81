/**
 * SEEDED RANDOMNESS
 *
 * Every random draw in a run (balances, roles, request sizes, donor
 * shuffles, production) comes from one Mulberry32 stream. Its 32-bit state
 * is written into each SimulationState, so any recorded step can be rerun
 * from its predecessor and reproduce the same requests, offers and transfers.
 * Math.random() is never used by the engine.
 */
export class DeterministicRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  // Uniform float in [0, 1); consumes one draw
  next(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  // Stored as SimulationState.rngState
  getState(): number {
    return this.state;
  }

  nextInt(maxExclusive: number): number {
    if (maxExclusive <= 1) return 0;
    return Math.floor(this.next() * maxExclusive);
  }

  rangeInt(min: number, maxInclusive: number): number {
    if (maxInclusive <= min) return min;
    return min + this.nextInt(maxInclusive - min + 1);
  }

  chance(probability: number): boolean {
    if (probability <= 0) return false;
    if (probability >= 1) return true;
    return this.next() < probability;
  }

  /**
   * Fisher-Yates Shuffle using this PRNG.
   * Shuffles in place and returns the same array.
   */
  shuffle<T>(array: T[]): T[] {
    let currentIndex = array.length;

    while (currentIndex !== 0) {
      const randomIndex = Math.floor(this.next() * currentIndex);
      currentIndex--;

      const held = array[currentIndex];
      array[currentIndex] = array[randomIndex];
      array[randomIndex] = held;
    }

    return array;
  }
}
