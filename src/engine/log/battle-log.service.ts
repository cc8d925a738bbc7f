// Append-only battle log: game data, separate from process logging

import { Injectable } from '@nestjs/common';
import type { BattleLogEntry, BattleState } from '../../db/types/index.js';

export interface LogEventInput {
  actorId: string;
  action: string;
  targetIds?: string[];
  result: string;
}

export interface LogQuery {
  /** trailing entries to return; 0 or absent = all */
  count?: number;
  actorId?: string;
}

@Injectable()
export class BattleLogService {
  /** stamps turn and phase from the state at the moment of the call */
  append(state: BattleState, input: LogEventInput, now: Date = new Date()): BattleLogEntry {
    const entry: BattleLogEntry = {
      turn: state.currentTurn,
      phase: state.currentPhase,
      actorId: input.actorId,
      action: input.action,
      targetIds: [...(input.targetIds ?? [])],
      result: input.result,
      timestamp: now.toISOString(),
    };
    state.log.push(entry);
    return entry;
  }

  /** filter by actor first, then keep the trailing `count`; returns copies */
  query(log: readonly BattleLogEntry[], query: LogQuery = {}): BattleLogEntry[] {
    const filtered =
      query.actorId === undefined ? log : log.filter((e) => e.actorId === query.actorId);
    const count = query.count ?? 0;
    const window = count > 0 ? filtered.slice(-count) : filtered;
    return window.map((e) => ({ ...e, targetIds: [...e.targetIds] }));
  }

  /** entries appended after `fromIndex` */
  since(log: readonly BattleLogEntry[], fromIndex: number): BattleLogEntry[] {
    return log.slice(fromIndex).map((e) => ({ ...e, targetIds: [...e.targetIds] }));
  }
}
