import {
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import type { DecisionSource, FilterTraceEntry } from '../types/index.js';

export const decisionLogs = pgTable(
  'decision_logs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    battleId: text('battle_id').notNull(),
    turn: integer('turn').notNull(),
    source: text('source').$type<DecisionSource>().notNull(),
    actionKey: text('action_key').notNull(),
    candidates: jsonb('candidates').$type<string[]>().notNull(),
    overriddenBy: text('overridden_by'),
    filterTrace: jsonb('filter_trace').$type<FilterTraceEntry[]>().notNull().default([]),
    attempts: integer('attempts').notNull(),
    modelUsed: text('model_used'),
    latencyMs: integer('latency_ms'),
    rawCompletion: text('raw_completion'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => [index('decision_logs_battle_idx').on(table.battleId, table.turn)],
);
