import { createHash, timingSafeEqual } from "node:crypto";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { Logger } from "../lib/logger.js";

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

/** Constant-time comparison of two shared secrets. */
export function secretsMatch(presented: string, expected: string): boolean {
  return timingSafeEqual(digest(presented), digest(expected));
}

/**
 * Create a requireAdmin preHandler hook for the admin API.
 *
 * Admin calls carry `Authorization: Bearer <ADMIN_API_TOKEN>`. Both sides are
 * hashed before comparison so the check takes the same time whatever the
 * length of the presented token.
 */
export function createRequireAdmin(
  adminToken: string,
  logger?: Logger,
): (request: FastifyRequest, reply: FastifyReply) => Promise<void> {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const header = request.headers.authorization;
    const presented = header?.startsWith("Bearer ") ? header.slice("Bearer ".length).trim() : "";

    if (presented.length === 0) {
      await reply.status(401).send({ error: "Unauthorized", message: "Missing bearer token", statusCode: 401 });
      return;
    }

    if (!secretsMatch(presented, adminToken)) {
      logger?.warn({ url: request.url, method: request.method, ip: request.ip }, "Admin access denied: bad token");
      await reply.status(401).send({ error: "Unauthorized", message: "Invalid bearer token", statusCode: 401 });
      return;
    }

    logger?.debug({ url: request.url, method: request.method }, "Admin access granted");
  };
}
