import { z } from 'zod';
import {
  BOOST_STAT,
  EFFECT,
  FIELD,
  MOVE_CATEGORY,
  MOVE_FLAG,
  POKEMON_TYPE,
  SIDE_CONDITION,
  STATUS,
  WEATHER,
} from '../../db/types/index.js';

const BoostTableSchema = z.record(z.enum(BOOST_STAT), z.number().int().min(-6).max(6));

export const MoveViewSchema = z.object({
  id: z.string().min(1).max(40),
  basePower: z.number().min(0),
  type: z.enum(POKEMON_TYPE),
  category: z.enum(MOVE_CATEGORY),
  accuracy: z.union([z.number().min(0).max(100), z.literal(true)]),
  priority: z.number().int().default(0),
  critRatio: z.number().int().min(0).default(0),
  flags: z.array(z.enum(MOVE_FLAG)).default([]),
  boosts: BoostTableSchema.nullable().default(null),
  recoil: z.number().min(0).default(0),
});

export const PokemonViewSchema = z.object({
  species: z.string().min(1).max(60),
  hpFraction: z.number().min(0).max(1),
  stats: z.object({
    hp: z.number().min(0),
    atk: z.number().min(0),
    def: z.number().min(0),
    spa: z.number().min(0),
    spd: z.number().min(0),
    spe: z.number().min(0),
  }),
  boosts: BoostTableSchema.default({}),
  status: z.enum(STATUS).nullable().default(null),
  statusCounter: z.number().int().min(0).default(0),
  ability: z.string().nullable().default(null),
  possibleAbilities: z.array(z.string()).default([]),
  item: z.string().nullable().default(null),
  types: z.array(z.enum(POKEMON_TYPE)).min(1).max(2),
  effects: z.array(z.enum(EFFECT)).default([]),
  mustRecharge: z.boolean().default(false),
  fainted: z.boolean().default(false),
  weightKg: z.number().positive().nullable().default(null),
  revealedMoves: z.array(MoveViewSchema).default([]),
  turnCount: z.number().int().min(0).default(0),
});

const SideConditionsSchema = z.record(z.enum(SIDE_CONDITION), z.number().int().min(0));

export const SubmitSnapshotBodySchema = z.object({
  turn: z.number().int().min(0),
  generation: z.number().int().min(1).max(9).default(9),
  activeSelf: PokemonViewSchema,
  activeOpponent: PokemonViewSchema,
  teamSelf: z.record(z.string(), PokemonViewSchema).default({}),
  teamOpponent: z.record(z.string(), PokemonViewSchema).default({}),
  fieldConditions: z.array(z.enum(FIELD)).default([]),
  weather: z.enum(WEATHER).nullable().default(null),
  sideConditionsSelf: SideConditionsSchema.default({}),
  sideConditionsOpponent: SideConditionsSchema.default({}),
  availableMoves: z.array(MoveViewSchema).default([]),
  availableSwitches: z.array(PokemonViewSchema).default([]),
  forceSwitch: z.boolean().default(false),
});

export type SubmitSnapshotBody = z.infer<typeof SubmitSnapshotBodySchema>;

export const ListDecisionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export type ListDecisionsQuery = z.infer<typeof ListDecisionsQuerySchema>;
