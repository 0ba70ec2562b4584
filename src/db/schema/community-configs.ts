import { pgTable, text, boolean, integer, timestamp, jsonb } from 'drizzle-orm/pg-core'

export const communityConfigs = pgTable('community_configs', {
  id: text('id').primaryKey(),
  title: text('title').notNull().default(''),
  threshold: integer('threshold').notNull().default(10),
  windowSeconds: integer('window_seconds').notNull().default(60),
  protectPremium: boolean('protect_premium').notNull().default(true),
  mitigationActive: boolean('mitigation_active').notNull().default(false),
  verificationEnabled: boolean('verification_enabled').notNull().default(false),
  scoringEnabled: boolean('scoring_enabled').notNull().default(false),
  scoringThreshold: integer('scoring_threshold').notNull().default(50),
  // Loosely typed on purpose: merged with defaults and clamped on load
  scoringWeights: jsonb('scoring_weights').$type<Record<string, unknown>>().notNull().default({}),
  languageDistribution: jsonb('language_distribution')
    .$type<Record<string, number>>()
    .notNull()
    .default({ en: 1 }),
  autoAdjustEnabled: boolean('auto_adjust_enabled').notNull().default(true),
  welcomeMessage: text('welcome_message'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
})
