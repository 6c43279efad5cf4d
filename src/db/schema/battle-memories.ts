import { boolean, pgTable, text, timestamp } from 'drizzle-orm/pg-core';

export const battleMemories = pgTable('battle_memories', {
  battleId: text('battle_id').primaryKey(),
  lastActionTaken: text('last_action_taken'),
  justSwitched: boolean('just_switched').default(false).notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});
