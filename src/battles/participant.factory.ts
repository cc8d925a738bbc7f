import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { Participant, ParticipantKind } from '../db/types/index.js';
import { parseInput } from '../common/validation/parse-input.js';
import { ValidationError } from '../common/errors/game-errors.js';
import {
  CreateCreatureParticipantSchema,
  CreateHandlerParticipantSchema,
  type CreateCreatureParticipantInput,
  type CreateHandlerParticipantInput,
} from './dto/create-participant.dto.js';

function isPlayerFaction(faction: string): boolean {
  return faction.toUpperCase() === 'PLAYER';
}

/** builds ready-to-add participants with fresh ids */
@Injectable()
export class ParticipantFactory {
  createCreature(raw: CreateCreatureParticipantInput): Participant {
    const input = parseInput(CreateCreatureParticipantSchema, raw, 'Invalid creature participant');
    const currentVigor = input.currentVigor ?? input.maxVigor;
    if (currentVigor > input.maxVigor) {
      throw new ValidationError('currentVigor must not exceed maxVigor', {
        currentVigor,
        maxVigor: input.maxVigor,
      });
    }
    const kind: ParticipantKind = isPlayerFaction(input.faction) ? 'PLAYER_CREATURE' : 'ENEMY_CREATURE';

    return {
      id: randomUUID(),
      name: input.name,
      kind,
      faction: input.faction,
      position: input.position,
      initiative: 0,
      hasActed: false,
      isDefeated: currentVigor === 0,
      relationships: {},
      combatant: {
        type: 'creature',
        species: input.species ?? input.name,
        types: input.types,
        stats: input.stats,
        currentVigor,
        maxVigor: input.maxVigor,
        statusEffects: [],
        statModifiers: {},
        usedMoves: [],
      },
    };
  }

  createHandler(raw: CreateHandlerParticipantInput): Participant {
    const input = parseInput(CreateHandlerParticipantSchema, raw, 'Invalid handler participant');
    const kind: ParticipantKind = isPlayerFaction(input.faction) ? 'PLAYER_HANDLER' : 'ENEMY_HANDLER';

    return {
      id: randomUUID(),
      name: input.name,
      kind,
      faction: input.faction,
      position: input.position,
      initiative: 0,
      hasActed: false,
      isDefeated: false,
      relationships: {},
      combatant: {
        type: 'handler',
        name: input.name,
        stats: input.stats,
        conditions: [],
        canEscape: input.canEscape,
        remainingTeam: input.remainingTeam,
      },
    };
  }
}
