// 타입 상성표: content/type-chart.json 로드 + 메모리 캐시

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { POKEMON_TYPE, type PokemonType } from '../../db/types/index.js';

const TYPE_CHART_PATH = join(process.cwd(), 'content', 'type-chart.json');

const PokemonTypeSchema = z.enum(POKEMON_TYPE);
const TypeChartSchema = z.record(
  PokemonTypeSchema,
  z.record(PokemonTypeSchema, z.number().min(0).max(2)),
);

/** 공격 타입 → (방어 타입 → 배율). 생략된 조합은 1배 */
export type TypeChart = z.infer<typeof TypeChartSchema>;

@Injectable()
export class TypeChartService implements OnModuleInit {
  private readonly logger = new Logger(TypeChartService.name);
  private chart: TypeChart = {};

  async onModuleInit(): Promise<void> {
    const raw = await readFile(TYPE_CHART_PATH, 'utf-8');
    this.chart = TypeChartSchema.parse(JSON.parse(raw));
    this.logger.log(
      `Type chart loaded: ${Object.keys(this.chart).length} attacking types`,
    );
  }

  /** 단일 방어 타입 배율 */
  single(attack: PokemonType, defend: PokemonType): number {
    return this.chart[attack]?.[defend] ?? 1;
  }

  /** 복합 타입 배율 = 각 타입 배율의 곱 (0, 0.25, 0.5, 1, 2, 4) */
  multiplier(attack: PokemonType, defenders: readonly PokemonType[]): number {
    return defenders.reduce((acc, t) => acc * this.single(attack, t), 1);
  }
}
