import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { TypeChartService } from './type-chart/type-chart.service.js';
import { StatsService } from './stats/stats.service.js';
import { StatusService } from './status/status.service.js';
import { HitService } from './combat/hit.service.js';
import { DamageService } from './combat/damage.service.js';
import { ActionResolverService } from './combat/action-resolver.service.js';
import { InitiativeService } from './initiative/initiative.service.js';
import { BattleLogService } from './log/battle-log.service.js';
import { PhaseService } from './phase/phase.service.js';
import { VictoryService } from './victory/victory.service.js';
import { RosterService } from './roster/roster.service.js';

const providers = [
  // Layer 1: sources and tables
  RngService,
  TypeChartService,
  // Layer 2: participant model
  StatsService,
  StatusService,
  RosterService,
  BattleLogService,
  // Layer 3: mechanics
  HitService,
  DamageService,
  InitiativeService,
  ActionResolverService,
  // Layer 4: flow
  PhaseService,
  VictoryService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
