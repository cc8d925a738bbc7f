import { Module, type DynamicModule, type Provider, type Type } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { BATTLE_EFFECTS_HOOK, type BattleEffectsHook } from '../engine/phase/battle-effects.hook.js';
import { BattlesService } from './battles.service.js';
import { ParticipantFactory } from './participant.factory.js';
import { NARRATION_SINK, type NarrationSink } from './narration.sink.js';
import { BATTLE_STATE_STORE, type BattleStateStore } from './store/battle-state.store.js';
import { DrizzleBattleStateStore } from './store/drizzle-battle-state.store.js';

export interface BattlesModuleOptions {
  /** defaults to the Postgres-backed store */
  store?: Type<BattleStateStore>;
  narrationSink?: NarrationSink;
  effectsHook?: BattleEffectsHook;
}

@Module({})
export class BattlesModule {
  /** global so the optional hooks reach PhaseService inside EngineModule */
  static forRoot(options: BattlesModuleOptions = {}): DynamicModule {
    const hooks: Provider[] = [];
    const hookTokens: symbol[] = [];
    if (options.narrationSink) {
      hooks.push({ provide: NARRATION_SINK, useValue: options.narrationSink });
      hookTokens.push(NARRATION_SINK);
    }
    if (options.effectsHook) {
      hooks.push({ provide: BATTLE_EFFECTS_HOOK, useValue: options.effectsHook });
      hookTokens.push(BATTLE_EFFECTS_HOOK);
    }

    return {
      module: BattlesModule,
      global: true,
      imports: [EngineModule],
      providers: [
        ...hooks,
        ParticipantFactory,
        { provide: BATTLE_STATE_STORE, useClass: options.store ?? DrizzleBattleStateStore },
        BattlesService,
      ],
      exports: [BattlesService, BATTLE_STATE_STORE, ...hookTokens],
    };
  }
}
