import { sql } from 'drizzle-orm'
import { pgTable, serial, text, integer, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core'

export const attackSessions = pgTable(
  'attack_sessions',
  {
    id: serial('id').primaryKey(),
    communityId: text('community_id').notNull(),
    threshold: integer('threshold').notNull(),
    detectedCount: integer('detected_count').notNull(),
    totalRemoved: integer('total_removed').notNull().default(0),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull().defaultNow(),
    endedAt: timestamp('ended_at', { withTimezone: true }),
  },
  (table) => [
    // At most one open session per community
    uniqueIndex('attack_sessions_open_idx')
      .on(table.communityId)
      .where(sql`${table.endedAt} is null`),
    index('attack_sessions_community_started_idx').on(table.communityId, table.startedAt),
  ]
)
