// Move metadata from content/moves.json, keyed by move name (case-insensitive)

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { CREATURE_TYPE, type MoveMeta } from '../db/types/index.js';
import { EngineConfigService } from '../config/engine-config.service.js';
import { InvalidConfigError } from '../common/errors/game-errors.js';

export const MOVE_CATALOG = Symbol('MOVE_CATALOG');

/** supplies move metadata the caller did not pass */
export interface MoveCatalog {
  findMove(moveName: string): MoveMeta | undefined;
}

const MoveListSchema = z.array(
  z.object({
    moveName: z.string().min(1),
    moveType: z.enum(CREATURE_TYPE),
    numDamageDice: z.number().int().min(1),
    isSpecialMove: z.boolean(),
  }),
);

// fs errors can come from another realm: match on shape
function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

@Injectable()
export class JsonMoveCatalogService implements MoveCatalog, OnModuleInit {
  private readonly logger = new Logger(JsonMoveCatalogService.name);
  private moves = new Map<string, MoveMeta>();

  constructor(private readonly config: EngineConfigService) {}

  async onModuleInit() {
    await this.load();
  }

  async load(contentDir: string = this.config.get().contentDir): Promise<number> {
    const file = join(contentDir, 'moves.json');
    let raw: string;
    try {
      raw = await readFile(file, 'utf-8');
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      this.logger.warn(`${file} not found, move catalog is empty`);
      this.moves = new Map();
      return 0;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new InvalidConfigError(`${file} is not valid JSON`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    const parsed = MoveListSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvalidConfigError(`${file} failed validation`, {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }

    this.moves = new Map(parsed.data.map((m) => [m.moveName.toLowerCase(), m]));
    this.logger.log(`Loaded ${this.moves.size} moves from ${file}`);
    return this.moves.size;
  }

  findMove(moveName: string): MoveMeta | undefined {
    const move = this.moves.get(moveName.toLowerCase());
    return move ? { ...move } : undefined;
  }
}
