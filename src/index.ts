import 'reflect-metadata';

export * from './db/types/index.js';
export * from './common/errors/game-errors.js';
export { AppModule } from './app.module.js';
export { createBattleEngine, type BattleEngine } from './bootstrap.js';
export { BattlesModule, type BattlesModuleOptions } from './battles/battles.module.js';
export { BattlesService } from './battles/battles.service.js';
export type * from './battles/battle-views.js';
export { BATTLE_STATE_STORE, type BattleStateStore } from './battles/store/battle-state.store.js';
export { DrizzleBattleStateStore } from './battles/store/drizzle-battle-state.store.js';
export { NARRATION_SINK, type NarrationSink } from './battles/narration.sink.js';
export { BATTLE_EFFECTS_HOOK, type BattleEffectsHook } from './engine/phase/battle-effects.hook.js';
export { MOVE_CATALOG, type MoveCatalog } from './content/move-catalog.service.js';
export { type RngProvider, Rng } from './engine/rng/rng.service.js';
export { TypeChartService, type EffectivenessLabel } from './engine/type-chart/type-chart.service.js';
export type { StartBattleInput } from './battles/dto/start-battle.dto.js';
export type { ParticipantInput, StatusEffectInput } from './battles/dto/participant.dto.js';
export type { ResolveActionInput } from './battles/dto/resolve-action.dto.js';
export type { VictoryEvaluation, ConditionResult } from './engine/victory/victory.service.js';
export type { PhaseAdvance } from './engine/phase/phase.service.js';
