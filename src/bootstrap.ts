import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { INestApplicationContext } from '@nestjs/common';
import { AppModule } from './app.module.js';
import type { BattlesModuleOptions } from './battles/battles.module.js';
import { BattlesService } from './battles/battles.service.js';

export interface BattleEngine {
  battles: BattlesService;
  context: INestApplicationContext;
  close(): Promise<void>;
}

/** standalone Nest context for hosts that are not Nest applications */
export async function createBattleEngine(options: BattlesModuleOptions = {}): Promise<BattleEngine> {
  const context = await NestFactory.createApplicationContext(AppModule.forRoot(options), {
    logger: ['error', 'warn', 'log'],
  });
  return {
    battles: context.get(BattlesService),
    context,
    close: () => context.close(),
  };
}
