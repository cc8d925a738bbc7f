// Deterministic RNG (splitmix64) keyed by seed + cursor

import { Injectable } from '@nestjs/common';

/** Injectable integer-range source; every battle mechanic draws through it */
export interface RngProvider {
  /** uniform integer in [min, maxInclusive] */
  nextInt(min: number, maxInclusive: number): number;
}

const MASK_64 = 0xFFFFFFFFFFFFFFFFn;

export class Rng implements RngProvider {
  private state: bigint;
  private _cursor: number;

  constructor(seed: string, cursor: number = 0) {
    this.state = this.hashSeed(seed);
    this._cursor = cursor;
    // fast-forward to cursor (state only)
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + 0x9E3779B97F4A7C15n) & MASK_64;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & MASK_64;
    return (z ^ (z >> 31n)) & MASK_64;
  }

  /** [0, 1) */
  next(): number {
    // 53 high bits keep the result strictly below 1
    return Number(this.nextRaw() >> 11n) / 2 ** 53;
  }

  nextInt(min: number, maxInclusive: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(maxInclusive) || maxInclusive < min) {
      throw new RangeError(`Invalid range [${min}, ${maxInclusive}]`);
    }
    return Math.floor(this.next() * (maxInclusive - min + 1)) + min;
  }

  get cursor(): number {
    return this._cursor;
  }
}

@Injectable()
export class RngService {
  create(seed: string, cursor: number = 0): Rng {
    return new Rng(seed, cursor);
  }

  /** initiative stream: restarted from its origin on every recompute */
  forInitiative(seed: string): Rng {
    return new Rng(`${seed}:initiative`, 0);
  }
}
