import { z } from "zod/v4";

const portSchema = z
  .string()
  .default("3000")
  .transform((val) => Number(val))
  .pipe(z.number().int().min(1).max(65535));

const intFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().int().min(0));

const positiveIntFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().int().positive());

const commaList = z
  .string()
  .default("")
  .transform((v) =>
    v
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  );

export const envSchema = z.object({
  // Required
  DATABASE_URL: z.url(),
  VALKEY_URL: z.url(),
  TELEGRAM_BOT_TOKEN: z.string().regex(/^\d+:[\w-]+$/, "Expected <bot id>:<secret>"),
  TELEGRAM_WEBHOOK_SECRET: z.string().min(16),
  ADMIN_API_TOKEN: z.string().min(32),

  // Server
  HOST: z.string().default("0.0.0.0"),
  PORT: portSchema,
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // CORS (admin presentation layer)
  CORS_ORIGINS: z.string().default("http://localhost:3001"),

  // Rate Limiting (requests per minute)
  RATE_LIMIT_ADMIN: intFromString("120"),
  RATE_LIMIT_WEBHOOK: intFromString("6000"),

  // Telegram Bot API
  TELEGRAM_API_URL: z.url().default("https://api.telegram.org"),
  TELEGRAM_TIMEOUT_MS: positiveIntFromString("10000"),

  // Administrator chats that receive attack/tuning notices (comma-separated)
  ADMIN_CHAT_IDS: commaList,

  // Protection
  VERIFICATION_TIMEOUT_SECONDS: positiveIntFromString("60"),
  WELCOME_MESSAGE_TTL_SECONDS: positiveIntFromString("180"),
  REMOVAL_BATCH_SIZE: positiveIntFromString("50"),
  REMOVAL_BATCH_PAUSE_MS: intFromString("1000"),
  STATS_CACHE_TTL_SECONDS: positiveIntFromString("300"),

  // Monitoring (GlitchTip - Sentry SDK compatible)
  GLITCHTIP_DSN: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(env: Record<string, unknown>): Env {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const formatted = z.prettifyError(result.error);
    throw new Error(`Invalid environment configuration:\n${formatted}`);
  }
  return result.data;
}

/** The bot's own user id is the numeric prefix of its token. */
export function getBotUserId(env: Pick<Env, "TELEGRAM_BOT_TOKEN">): number {
  return Number(env.TELEGRAM_BOT_TOKEN.split(":")[0]);
}
