import type { RngProvider } from '../engine/rng/rng.service.js';

/**
 * Returns predefined integers in order, checking each against the
 * requested range. Throws when the script runs out.
 */
export class ScriptedRng implements RngProvider {
  private readonly rolls: number[];
  private index = 0;
  readonly calls: Array<{ min: number; max: number }> = [];

  constructor(rolls: number[]) {
    this.rolls = [...rolls];
  }

  nextInt(min: number, maxInclusive: number): number {
    if (this.index >= this.rolls.length) {
      throw new Error(
        `ScriptedRng: no more rolls. Requested roll ${this.index + 1}, but only ${this.rolls.length} provided.`,
      );
    }
    const roll = this.rolls[this.index];
    if (roll < min || roll > maxInclusive) {
      throw new Error(`ScriptedRng: roll ${roll} outside [${min}, ${maxInclusive}]`);
    }
    this.index++;
    this.calls.push({ min, max: maxInclusive });
    return roll;
  }

  get remaining(): number {
    return this.rolls.length - this.index;
  }
}
