// Participant bookkeeping: membership and relationship maps

import { Injectable } from '@nestjs/common';
import type { BattleState, Participant, Relationship } from '../../db/types/index.js';
import { NotFoundError, ValidationError } from '../../common/errors/game-errors.js';

function defaultRelationship(a: Participant, b: Participant): Relationship {
  return a.faction === b.faction ? 'ALLIED' : 'HOSTILE';
}

@Injectable()
export class RosterService {
  find(state: BattleState, id: string): Participant | undefined {
    return state.participants.find((p) => p.id === id);
  }

  require(state: BattleState, id: string): Participant {
    const participant = this.find(state, id);
    if (!participant) {
      throw new NotFoundError(`Participant not found: ${id}`, { participantId: id });
    }
    return participant;
  }

  /** setup rule: same faction → ALLIED, otherwise HOSTILE, overwriting both ways */
  initRelationships(state: BattleState): void {
    for (const p of state.participants) {
      for (const other of state.participants) {
        if (other.id !== p.id) p.relationships[other.id] = defaultRelationship(p, other);
      }
    }
  }

  /** appends and links the newcomer to everyone present, both ways */
  add(state: BattleState, participant: Participant): void {
    if (this.find(state, participant.id)) {
      throw new ValidationError(`Participant id already in battle: ${participant.id}`, {
        participantId: participant.id,
      });
    }
    for (const other of state.participants) {
      participant.relationships[other.id] = defaultRelationship(participant, other);
      other.relationships[participant.id] = defaultRelationship(other, participant);
    }
    state.participants.push(participant);
  }

  /** removes the participant and every relationship entry pointing at it */
  remove(state: BattleState, id: string): Participant {
    const removed = this.require(state, id);
    state.participants = state.participants.filter((p) => p.id !== id);
    for (const p of state.participants) {
      delete p.relationships[id];
    }
    return removed;
  }

  /** one-directional; the other side keeps its own view */
  setRelationship(state: BattleState, id: string, otherId: string, relationship: Relationship): void {
    const participant = this.require(state, id);
    this.require(state, otherId);
    if (id === otherId) {
      throw new ValidationError('A participant has no relationship with itself', { participantId: id });
    }
    participant.relationships[otherId] = relationship;
  }
}
