import { pgTable, serial, text, bigint, integer, boolean, timestamp, index } from 'drizzle-orm/pg-core'

export const verificationOutcomes = pgTable(
  'verification_outcomes',
  {
    id: serial('id').primaryKey(),
    communityId: text('community_id').notNull(),
    userId: bigint('user_id', { mode: 'number' }).notNull(),
    outcome: text('outcome', { enum: ['passed', 'failed'] }).notNull(),
    reason: text('reason', { enum: ['correct_answer', 'wrong_answer', 'timeout'] }).notNull(),
    usernamePresent: boolean('username_present').notNull(),
    languageCode: text('language_code'),
    isPremium: boolean('is_premium').notNull(),
    avatarCount: integer('avatar_count'),
    hasExoticScript: boolean('has_exotic_script').notNull(),
    hasWeirdName: boolean('has_weird_name').notNull(),
    riskScore: integer('risk_score').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('verification_outcomes_lookup_idx').on(table.communityId, table.outcome, table.createdAt),
  ]
)
