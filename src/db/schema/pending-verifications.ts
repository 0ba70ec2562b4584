import { pgTable, text, bigint, integer, timestamp, jsonb, primaryKey, index } from 'drizzle-orm/pg-core'
import type { AccountProfile } from '../../gateway/types.js'

export const pendingVerifications = pgTable(
  'pending_verifications',
  {
    communityId: text('community_id').notNull(),
    userId: bigint('user_id', { mode: 'number' }).notNull(),
    challengeMessageId: integer('challenge_message_id'),
    correctAnswer: text('correct_answer').notNull(),
    riskScore: integer('risk_score').notNull(),
    account: jsonb('account').$type<AccountProfile>().notNull(),
    avatarCount: integer('avatar_count'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.communityId, table.userId] }),
    index('pending_verifications_expires_at_idx').on(table.expiresAt),
  ]
)
