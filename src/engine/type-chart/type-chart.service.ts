// Type effectiveness: attack type × defense type(s) → damage multiplier

import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { CREATURE_TYPE, type CreatureType } from '../../db/types/index.js';
import chartData from './type-chart.json';

const Multiplier = z.union([z.literal(0), z.literal(0.5), z.literal(1), z.literal(2)]);
const TypeChartSchema = z.record(
  z.enum(CREATURE_TYPE),
  z.record(z.enum(CREATURE_TYPE), Multiplier),
);

export type TypeChart = z.infer<typeof TypeChartSchema>;

/** one-vs-one chart; pairs absent from the data are neutral (1.0) */
const DEFAULT_CHART: TypeChart = TypeChartSchema.parse(chartData);

export type EffectivenessLabel =
  | 'No Effect'
  | 'Not Very Effective'
  | 'Normal Effectiveness'
  | 'Super Effective';

@Injectable()
export class TypeChartService {
  private readonly chart: TypeChart = DEFAULT_CHART;

  /** single defending type, value ∈ {0, 0.5, 1, 2} */
  single(attackType: CreatureType, defenseType: CreatureType): number {
    return this.chart[attackType]?.[defenseType] ?? 1;
  }

  /** dual type = product of both single lookups; result ∈ {0, 0.25, 0.5, 1, 2, 4} */
  effectiveness(
    attackType: CreatureType,
    type1: CreatureType,
    type2?: CreatureType,
  ): number {
    const first = this.single(attackType, type1);
    const second = type2 === undefined ? 1 : this.single(attackType, type2);
    return first * second;
  }

  superEffectiveAgainst(attackType: CreatureType): CreatureType[] {
    return CREATURE_TYPE.filter((t) => this.single(attackType, t) === 2);
  }

  notVeryEffectiveAgainst(attackType: CreatureType): CreatureType[] {
    return CREATURE_TYPE.filter((t) => this.single(attackType, t) === 0.5);
  }

  noEffectAgainst(attackType: CreatureType): CreatureType[] {
    return CREATURE_TYPE.filter((t) => this.single(attackType, t) === 0);
  }

  describe(multiplier: number): EffectivenessLabel {
    if (multiplier === 0) return 'No Effect';
    if (multiplier < 1) return 'Not Very Effective';
    if (multiplier > 1) return 'Super Effective';
    return 'Normal Effectiveness';
  }
}
