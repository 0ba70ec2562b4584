import type { FastifyPluginCallback } from "fastify";
import { badRequest, notFound } from "../lib/api-errors.js";
import type { AttackSession } from "../stores/types.js";
import { communityIdSchema, listLimitSchema, updateCommunitySchema } from "../validation/communities.js";

// ---------------------------------------------------------------------------
// OpenAPI JSON Schema definitions
// ---------------------------------------------------------------------------

const errorJsonSchema = {
  type: "object" as const,
  properties: {
    error: { type: "string" as const },
    message: { type: "string" as const },
    statusCode: { type: "integer" as const },
  },
};

const idParamsJsonSchema = {
  type: "object" as const,
  required: ["id"],
  properties: { id: { type: "string" as const } },
};

const errorResponses = {
  400: errorJsonSchema,
  401: errorJsonSchema,
  404: errorJsonSchema,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseCommunityId(params: unknown): string {
  const raw = typeof params === "object" && params !== null && "id" in params ? params.id : undefined;
  const parsed = communityIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw badRequest("Invalid community id");
  }
  return parsed.data;
}

function parseLimit(query: unknown): number {
  const parsed = listLimitSchema.safeParse(query ?? {});
  if (!parsed.success) {
    throw badRequest("limit must be an integer between 1 and 100");
  }
  return parsed.data.limit;
}

function serializeSession(session: AttackSession) {
  return {
    id: session.id,
    communityId: session.communityId,
    threshold: session.threshold,
    detectedCount: session.detectedCount,
    totalRemoved: session.totalRemoved,
    startedAt: session.startedAt.toISOString(),
    endedAt: session.endedAt?.toISOString() ?? null,
  };
}

// ---------------------------------------------------------------------------
// Community admin routes plugin
// ---------------------------------------------------------------------------

/**
 * Admin API for protected communities. Every route requires the admin token.
 *
 * - GET    /api/communities                        -- List protected communities
 * - GET    /api/communities/:id                    -- Get one configuration
 * - PUT    /api/communities/:id                    -- Create or update a configuration
 * - DELETE /api/communities/:id                    -- Stop protecting a community
 * - GET    /api/communities/:id/attacks            -- Recent attack sessions
 * - GET    /api/communities/:id/stats              -- Effectiveness and outcome profiles
 * - DELETE /api/communities/:id/stats/passed       -- Clear the successful-verification profile
 * - POST   /api/communities/:id/tune               -- Run weight tuning now
 * - GET    /api/communities/:id/notifications      -- Admin notification feed
 */
export function communityRoutes(): FastifyPluginCallback {
  return (app, _opts, done) => {
    const { configStore, history, joinCounter, scoringStats, protectionStats, tuner, notifications } = app;
    const requireAdmin = app.requireAdmin;
    const routeBase = { preHandler: [requireAdmin] };
    const security = [{ bearerAuth: [] }];

    async function requireCommunity(id: string) {
      const config = await configStore.get(id);
      if (!config) {
        throw notFound("Community not found");
      }
      return config;
    }

    // -------------------------------------------------------------------
    // GET /api/communities
    // -------------------------------------------------------------------

    app.get("/api/communities", {
      ...routeBase,
      schema: { tags: ["Communities"], summary: "List protected communities", security, response: { 401: errorJsonSchema } },
    }, async (_request, reply) => {
      const communities = await configStore.list();
      return reply.status(200).send({ communities });
    });

    // -------------------------------------------------------------------
    // GET /api/communities/:id
    // -------------------------------------------------------------------

    app.get("/api/communities/:id", {
      ...routeBase,
      schema: { tags: ["Communities"], summary: "Get community configuration", security, params: idParamsJsonSchema, response: errorResponses },
    }, async (request, reply) => {
      const config = await requireCommunity(parseCommunityId(request.params));
      return reply.status(200).send(config);
    });

    // -------------------------------------------------------------------
    // PUT /api/communities/:id
    // -------------------------------------------------------------------

    app.put("/api/communities/:id", {
      ...routeBase,
      schema: {
        tags: ["Communities"],
        summary: "Create or update community configuration",
        security,
        params: idParamsJsonSchema,
        body: { type: "object" },
        response: errorResponses,
      },
    }, async (request, reply) => {
      const id = parseCommunityId(request.params);
      const parsed = updateCommunitySchema.safeParse(request.body);
      if (!parsed.success) {
        throw badRequest("Invalid community configuration");
      }

      const config = await configStore.upsert(id, parsed.data);
      request.log.info({ communityId: id, fields: Object.keys(parsed.data) }, "Community configuration updated");
      return reply.status(200).send(config);
    });

    // -------------------------------------------------------------------
    // DELETE /api/communities/:id
    // -------------------------------------------------------------------

    app.delete("/api/communities/:id", {
      ...routeBase,
      schema: { tags: ["Communities"], summary: "Stop protecting a community", security, params: idParamsJsonSchema, response: errorResponses },
    }, async (request, reply) => {
      const id = parseCommunityId(request.params);
      const removed = await configStore.remove(id);
      if (!removed) {
        throw notFound("Community not found");
      }

      joinCounter.clear(id);
      await scoringStats.invalidate(id);
      request.log.info({ communityId: id }, "Community removed from protection");
      return reply.status(204).send();
    });

    // -------------------------------------------------------------------
    // GET /api/communities/:id/attacks
    // -------------------------------------------------------------------

    app.get("/api/communities/:id/attacks", {
      ...routeBase,
      schema: { tags: ["Communities"], summary: "List recent attack sessions", security, params: idParamsJsonSchema, response: errorResponses },
    }, async (request, reply) => {
      const id = parseCommunityId(request.params);
      const limit = parseLimit(request.query);
      await requireCommunity(id);

      const sessions = await history.listSessions(id, limit);
      return reply.status(200).send({ sessions: sessions.map(serializeSession) });
    });

    // -------------------------------------------------------------------
    // GET /api/communities/:id/stats
    // -------------------------------------------------------------------

    app.get("/api/communities/:id/stats", {
      ...routeBase,
      schema: { tags: ["Communities"], summary: "Protection effectiveness and outcome profiles", security, params: idParamsJsonSchema, response: errorResponses },
    }, async (request, reply) => {
      const id = parseCommunityId(request.params);
      await requireCommunity(id);
      return reply.status(200).send(await protectionStats.report(id));
    });

    // -------------------------------------------------------------------
    // DELETE /api/communities/:id/stats/passed
    // -------------------------------------------------------------------

    app.delete("/api/communities/:id/stats/passed", {
      ...routeBase,
      schema: { tags: ["Communities"], summary: "Clear the successful-verification profile", security, params: idParamsJsonSchema, response: errorResponses },
    }, async (request, reply) => {
      const id = parseCommunityId(request.params);
      await requireCommunity(id);

      const cleared = await protectionStats.clearPassedProfile(id);
      request.log.info({ communityId: id, cleared }, "Successful-verification profile cleared");
      return reply.status(200).send({ cleared });
    });

    // -------------------------------------------------------------------
    // POST /api/communities/:id/tune
    // -------------------------------------------------------------------

    app.post("/api/communities/:id/tune", {
      ...routeBase,
      schema: { tags: ["Communities"], summary: "Run scoring weight tuning now", security, params: idParamsJsonSchema, response: errorResponses },
    }, async (request, reply) => {
      const id = parseCommunityId(request.params);
      await requireCommunity(id);
      return reply.status(200).send(await tuner.tune(id));
    });

    // -------------------------------------------------------------------
    // GET /api/communities/:id/notifications
    // -------------------------------------------------------------------

    app.get("/api/communities/:id/notifications", {
      ...routeBase,
      schema: { tags: ["Communities"], summary: "Admin notification feed", security, params: idParamsJsonSchema, response: errorResponses },
    }, async (request, reply) => {
      const id = parseCommunityId(request.params);
      const limit = parseLimit(request.query);
      await requireCommunity(id);

      return reply.status(200).send({ notifications: await notifications.list(id, limit) });
    });

    done();
  };
}
