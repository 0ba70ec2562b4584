import { pgTable, serial, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core'

export const adminNotifications = pgTable(
  'admin_notifications',
  {
    id: serial('id').primaryKey(),
    communityId: text('community_id').notNull(),
    kind: text('kind', {
      enum: ['attack_started', 'attack_ended', 'weight_adjustment'],
    }).notNull(),
    payload: jsonb('payload').$type<Record<string, unknown>>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('admin_notifications_community_created_idx').on(table.communityId, table.createdAt)]
)
