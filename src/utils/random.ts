import type { Vector3 } from 'types';

/**
 * Seeded pseudo-random source (mulberry32). Each Monte Carlo chain owns one instance,
 * so chains with the same seed replay the same sequence of draws.
 */
export class RandomGenerator {
  private state: number;

  /**
   * @param seed Integer seed; `null` seeds from system entropy and is not reproducible
   */
  constructor(seed: number | null) {
    this.state = seed === null ? Math.floor(Math.random() * 0x100000000) >>> 0 : seed >>> 0;
  }

  /**
   * Uniform draw in [0, 1).
   */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /**
   * Uniform draw in [low, high).
   */
  uniform(low: number, high: number): number {
    return low + (high - low) * this.next();
  }

  /**
   * Three independent draws in [0, 1).
   */
  vector3(): Vector3 {
    const x = this.next();
    const y = this.next();
    const z = this.next();
    return [x, y, z];
  }

  choice<T>(items: readonly T[]): T {
    const item = items[Math.floor(this.next() * items.length)];
    if (item === undefined) {
      throw new Error('Cannot choose from an empty list');
    }
    return item;
  }
}
