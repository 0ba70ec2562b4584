import type { FastifyBaseLogger, FastifyPluginCallback } from "fastify";
import { secretsMatch } from "../auth/require-admin.js";
import { ANSWER_CALLBACK_PREFIX } from "../gateway/telegram.js";
import type { AnswerResult } from "../services/verification.js";
import { isJoin, toAccountProfile, updateSchema } from "../validation/telegram.js";
import type { ChatMemberUpdated, TelegramMessage } from "../validation/telegram.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const SECRET_HEADER = "x-telegram-bot-api-secret-token";

const ANSWER_ACKNOWLEDGEMENTS: Record<Exclude<AnswerResult, "ignored">, string> = {
  passed: "Correct, welcome!",
  failed: "Wrong answer.",
  no_challenge: "This challenge is not yours or has already expired.",
};

const errorJsonSchema = {
  type: "object" as const,
  properties: {
    error: { type: "string" as const },
    message: { type: "string" as const },
    statusCode: { type: "integer" as const },
  },
};

// ---------------------------------------------------------------------------
// Telegram webhook plugin
// ---------------------------------------------------------------------------

/**
 * Ingress for Telegram updates.
 *
 * - POST /api/telegram/webhook
 *
 * Joins are handled in the background so mass removals never hold the
 * webhook response; answers and message cleanup are handled inline.
 */
export function telegramWebhookRoutes(): FastifyPluginCallback {
  return (app, _opts, done) => {
    const { env, configStore, joinHandler, verification, gateway } = app;

    function dispatchJoin(update: ChatMemberUpdated, log: FastifyBaseLogger): void {
      const communityId = String(update.chat.id);
      const account = toAccountProfile(update.new_chat_member.user);
      joinHandler
        .handleJoin(communityId, account)
        .then((outcome) => {
          log.debug({ communityId, userId: account.id, outcome }, "Join handled");
        })
        .catch((err: unknown) => {
          log.error({ err, communityId, userId: account.id }, "Join handling failed");
        });
    }

    async function deleteQuietly(chatId: string, messageId: number, log: FastifyBaseLogger): Promise<void> {
      try {
        await gateway.deleteMessage(chatId, messageId);
      } catch (err: unknown) {
        log.debug({ err, chatId, messageId }, "Could not delete message");
      }
    }

    async function handleMessage(message: TelegramMessage, log: FastifyBaseLogger): Promise<void> {
      if (message.chat.type !== "group" && message.chat.type !== "supergroup") return;
      const chatId = String(message.chat.id);

      if (message.new_chat_members !== undefined || message.left_chat_member !== undefined) {
        if (await configStore.get(chatId)) {
          await deleteQuietly(chatId, message.message_id, log);
        }
        return;
      }

      const sender = message.from;
      if (!sender || !(await verification.isPending(chatId, sender.id))) return;

      // Until they answer, anything a challenged user posts is removed
      await deleteQuietly(chatId, message.message_id, log);
      const text = message.text ?? message.caption;
      if (text !== undefined) {
        await verification.submitAnswer(chatId, sender.id, text);
      }
    }

    app.post(
      "/api/telegram/webhook",
      {
        config: {
          rateLimit: { max: env.RATE_LIMIT_WEBHOOK, timeWindow: "1 minute" },
        },
        schema: {
          tags: ["Telegram"],
          summary: "Receive a Telegram update",
          response: { 401: errorJsonSchema },
        },
      },
      async (request, reply) => {
        const presented = request.headers[SECRET_HEADER];
        if (typeof presented !== "string" || !secretsMatch(presented, env.TELEGRAM_WEBHOOK_SECRET)) {
          request.log.warn({ ip: request.ip }, "Webhook call with a bad secret token");
          return reply.status(401).send({ error: "Unauthorized", message: "Bad secret token", statusCode: 401 });
        }

        const parsed = updateSchema.safeParse(request.body);
        if (!parsed.success) {
          // Acknowledge anyway: Telegram would redeliver it forever
          request.log.warn({ issues: parsed.error.issues.length }, "Ignoring unrecognised update");
          return reply.status(200).send({ ok: true });
        }
        const update = parsed.data;

        if (update.chat_member && isJoin(update.chat_member)) {
          dispatchJoin(update.chat_member, request.log);
        }

        const query = update.callback_query;
        if (query?.data?.startsWith(ANSWER_CALLBACK_PREFIX) && query.message) {
          const chatId = String(query.message.chat.id);
          const result = await verification.submitAnswer(
            chatId,
            query.from.id,
            query.data.slice(ANSWER_CALLBACK_PREFIX.length),
          );
          if (result !== "ignored") {
            try {
              await gateway.acknowledge(query.id, ANSWER_ACKNOWLEDGEMENTS[result]);
            } catch (err: unknown) {
              request.log.debug({ err, chatId }, "Could not acknowledge answer");
            }
          }
        }

        if (update.message) {
          await handleMessage(update.message, request.log);
        }

        return reply.status(200).send({ ok: true });
      },
    );

    done();
  };
}
