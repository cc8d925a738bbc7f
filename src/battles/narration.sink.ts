import type { ActionResult, BattleLogEntry } from '../db/types/index.js';

export const NARRATION_SINK = Symbol('NARRATION_SINK');

/** receives what changed after each persisted operation, for text rendering */
export interface NarrationSink {
  publish(entries: BattleLogEntry[], results: ActionResult[]): void | Promise<void>;
}
