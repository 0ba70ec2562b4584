import Fastify from "fastify";
import helmet from "@fastify/helmet";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import scalarApiReference from "@scalar/fastify-api-reference";
import * as Sentry from "@sentry/node";
import type { FastifyError } from "fastify";
import type { Env } from "./config/env.js";
import { createDb } from "./db/index.js";
import type { Database } from "./db/index.js";
import { createCache } from "./cache/index.js";
import type { Cache } from "./cache/index.js";
import { createRequireAdmin } from "./auth/require-admin.js";
import { TelegramGateway } from "./gateway/telegram.js";
import type { MessagingGateway } from "./gateway/types.js";
import { JoinWindowCounter } from "./lib/join-window.js";
import { createConfigStore } from "./stores/config-store.js";
import type { ConfigStore } from "./stores/config-store.js";
import { createHistoryStore } from "./stores/history-store.js";
import type { HistoryStore } from "./stores/history-store.js";
import { createVerificationStore } from "./stores/verification-store.js";
import { createNotificationService } from "./services/notification.js";
import type { NotificationService } from "./services/notification.js";
import { createScoringStatsService } from "./services/scoring-stats.js";
import type { ScoringStatsService } from "./services/scoring-stats.js";
import { createWeightTuner } from "./services/weight-tuner.js";
import type { WeightTuner } from "./services/weight-tuner.js";
import { createVerificationWorkflow } from "./services/verification.js";
import type { VerificationWorkflow } from "./services/verification.js";
import { createAttackDetector } from "./services/attack-detector.js";
import { createJoinHandler } from "./services/join-handler.js";
import type { JoinHandler } from "./services/join-handler.js";
import { createProtectionStatsService } from "./services/protection-stats.js";
import type { ProtectionStatsService } from "./services/protection-stats.js";
import healthRoutes from "./routes/health.js";
import { telegramWebhookRoutes } from "./routes/telegram-webhook.js";
import { communityRoutes } from "./routes/communities.js";

// Extend Fastify types with decorated properties
declare module "fastify" {
  interface FastifyInstance {
    db: Database;
    cache: Cache;
    env: Env;
    gateway: MessagingGateway;
    joinCounter: JoinWindowCounter;
    configStore: ConfigStore;
    history: HistoryStore;
    scoringStats: ScoringStatsService;
    notifications: NotificationService;
    tuner: WeightTuner;
    verification: VerificationWorkflow;
    joinHandler: JoinHandler;
    protectionStats: ProtectionStatsService;
    requireAdmin: ReturnType<typeof createRequireAdmin>;
  }
}

export async function buildApp(env: Env) {
  // Initialize GlitchTip/Sentry if DSN provided
  if (env.GLITCHTIP_DSN) {
    Sentry.init({
      dsn: env.GLITCHTIP_DSN,
      environment:
        env.LOG_LEVEL === "debug" || env.LOG_LEVEL === "trace"
          ? "development"
          : "production",
    });
  }

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      ...(env.LOG_LEVEL === "debug" || env.LOG_LEVEL === "trace"
        ? { transport: { target: "pino-pretty" } }
        : {}),
      // Shared secrets stay out of request logs
      redact: ["req.headers.authorization", 'req.headers["x-telegram-bot-api-secret-token"]'],
    },
    trustProxy: true,
  });

  // Database
  const { db, client: dbClient } = createDb(env.DATABASE_URL);
  app.decorate("db", db);
  app.decorate("env", env);

  // Cache
  const cache = createCache(env.VALKEY_URL, app.log);
  app.decorate("cache", cache);

  // Messaging gateway
  const gateway = new TelegramGateway(
    { token: env.TELEGRAM_BOT_TOKEN, apiUrl: env.TELEGRAM_API_URL, timeoutMs: env.TELEGRAM_TIMEOUT_MS },
    app.log,
  );
  app.decorate("gateway", gateway);

  // Stores
  const configStore = createConfigStore(db);
  const history = createHistoryStore(db);
  const verificationStore = createVerificationStore(db);
  app.decorate("configStore", configStore);
  app.decorate("history", history);

  // Protection services
  const joinCounter = new JoinWindowCounter();
  app.decorate("joinCounter", joinCounter);

  const notifications = createNotificationService(db, gateway, env.ADMIN_CHAT_IDS, app.log);
  app.decorate("notifications", notifications);

  const scoringStats = createScoringStatsService(history, cache, app.log, {
    ttlSeconds: env.STATS_CACHE_TTL_SECONDS,
  });
  app.decorate("scoringStats", scoringStats);

  const tuner = createWeightTuner({ configStore, history, notifications, logger: app.log });
  app.decorate("tuner", tuner);

  const verification = createVerificationWorkflow({
    store: verificationStore,
    history,
    configStore,
    gateway,
    tuner,
    logger: app.log,
    timeoutSeconds: env.VERIFICATION_TIMEOUT_SECONDS,
    welcomeTtlSeconds: env.WELCOME_MESSAGE_TTL_SECONDS,
  });
  app.decorate("verification", verification);

  const detector = createAttackDetector({
    counter: joinCounter,
    configStore,
    history,
    gateway,
    notifications,
    logger: app.log,
    removal: { batchSize: env.REMOVAL_BATCH_SIZE, pauseMs: env.REMOVAL_BATCH_PAUSE_MS },
  });

  const joinHandler = createJoinHandler({
    configStore,
    detector,
    stats: scoringStats,
    verification,
    gateway,
    logger: app.log,
  });
  app.decorate("joinHandler", joinHandler);

  app.decorate("protectionStats", createProtectionStatsService(history, scoringStats));

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-inline'", "https://cdn.jsdelivr.net"],
        styleSrc: ["'self'", "'unsafe-inline'", "https://cdn.jsdelivr.net"],
        imgSrc: ["'self'", "data:", "https:"],
        connectSrc: ["'self'"],
        fontSrc: ["'self'", "https://cdn.jsdelivr.net"],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
      },
    },
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true,
    },
  });

  // CORS
  await app.register(cors, {
    origin: env.CORS_ORIGINS.split(",").map((o) => o.trim()),
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });

  // Rate limiting (the webhook route raises its own limit)
  await app.register(rateLimit, {
    max: env.RATE_LIMIT_ADMIN,
    timeWindow: "1 minute",
  });

  // Admin middleware
  const requireAdmin = createRequireAdmin(env.ADMIN_API_TOKEN, app.log);
  app.decorate("requireAdmin", requireAdmin);

  // OpenAPI documentation (register before routes so schemas are collected)
  await app.register(swagger, {
    openapi: {
      openapi: "3.1.0",
      info: {
        title: "Raid Shield API",
        description:
          "Join-raid detection, adaptive risk scoring and human verification for chat communities.",
        version: "0.1.0",
      },
      servers: [
        {
          url: `http://${env.HOST}:${String(env.PORT)}`,
          description: "Primary server",
        },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: "http",
            scheme: "bearer",
            description: "ADMIN_API_TOKEN",
          },
        },
      },
    },
  });

  await app.register(scalarApiReference, {
    routePrefix: "/docs",
    configuration: {
      theme: "kepler",
    },
  });

  // Routes
  await app.register(healthRoutes);
  await app.register(telegramWebhookRoutes());
  await app.register(communityRoutes());

  // OpenAPI document endpoint (after routes so all schemas are registered)
  app.get("/api/openapi.json", { schema: { hide: true } }, async (_request, reply) => {
    return reply
      .header("Content-Type", "application/json")
      .send(app.swagger());
  });

  // Pick up challenges that were pending when the process last stopped
  app.addHook("onReady", async () => {
    const recovered = await verification.recover();
    app.log.info({ recovered }, "Verification workflow ready");
  });

  // Graceful shutdown: cancel timers before closing DB
  app.addHook("onClose", async () => {
    app.log.info("Shutting down...");
    verification.shutdown();
    await cache.quit();
    await dbClient.end();
    app.log.info("Connections closed");
  });

  // GlitchTip error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      if (env.GLITCHTIP_DSN) {
        Sentry.captureException(error);
      }
      app.log.error(
        { err: error, requestId: request.id },
        "Unhandled error",
      );
    } else {
      request.log.debug({ err: error, statusCode }, "Request rejected");
    }

    return reply.status(statusCode).send({
      error: statusCode >= 500 ? "Internal Server Error" : error.name,
      message:
        statusCode < 500 || env.LOG_LEVEL === "debug" || env.LOG_LEVEL === "trace"
          ? error.message
          : "An unexpected error occurred",
      statusCode,
    });
  });

  return app;
}
