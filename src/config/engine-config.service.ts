// Engine configuration: .env defaults + runtime patching

import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import { z } from 'zod';
import { InvalidConfigError } from '../common/errors/game-errors.js';

const EngineEnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  BATTLE_SESSION_ID: z.string().min(1).max(120).default('default'),
  BATTLE_CONTENT_DIR: z.string().min(1).optional(),
  BATTLE_RNG_SEED: z.string().min(1).optional(),
});

export interface EngineConfig {
  databaseUrl?: string;
  /** key under which the store keeps "the" battle of this process */
  sessionId: string;
  contentDir: string;
  /** fixed seed for every new battle; random per battle when unset */
  rngSeed?: string;
}

export type EngineConfigPatch = Partial<Pick<EngineConfig, 'sessionId' | 'rngSeed'>>;

export function loadEngineConfig(env: Record<string, string | undefined>): EngineConfig {
  const parsed = EngineEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigError('Invalid engine environment', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL,
    sessionId: e.BATTLE_SESSION_ID,
    contentDir: e.BATTLE_CONTENT_DIR ?? join(process.cwd(), 'content'),
    rngSeed: e.BATTLE_RNG_SEED,
  };
}

@Injectable()
export class EngineConfigService {
  private readonly logger = new Logger(EngineConfigService.name);
  private config: EngineConfig;

  constructor() {
    this.config = loadEngineConfig(process.env);
  }

  get(): EngineConfig {
    return this.config;
  }

  /** applies to the next battle started */
  update(patch: EngineConfigPatch): EngineConfig {
    this.config = { ...this.config, ...patch };
    this.logger.log(`Engine config updated: ${Object.keys(patch).join(', ')}`);
    return this.config;
  }
}
