import type { z } from "zod/v4";
import type { Logger } from "../lib/logger.js";
import {
  apiResponseSchema,
  chatMemberSchema,
  profilePhotosSchema,
  sentMessageSchema,
  toAccountProfile,
} from "../validation/telegram.js";
import { GatewayError } from "./types.js";
import type { MemberInfo, MessagingGateway, OutgoingMessage } from "./types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_API_URL = "https://api.telegram.org";
const DEFAULT_TIMEOUT_MS = 10_000;
const CHOICES_PER_ROW = 2;

/** Prefix of the callback data carried by answer buttons. */
export const ANSWER_CALLBACK_PREFIX = "verify:";

export interface TelegramGatewayOptions {
  token: string;
  apiUrl?: string;
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

/**
 * Telegram Bot API implementation of the messaging gateway.
 *
 * No retry policy lives here: a failed call throws `GatewayError` and the
 * caller decides whether that matters.
 */
export class TelegramGateway implements MessagingGateway {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    options: TelegramGatewayOptions,
    private readonly logger: Logger,
  ) {
    this.baseUrl = `${options.apiUrl ?? DEFAULT_API_URL}/bot${options.token}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async removeMember(communityId: string, userId: number): Promise<void> {
    // Ban followed by unban is a kick: the user may rejoin later
    await this.call("banChatMember", { chat_id: communityId, user_id: userId });
    await this.call("unbanChatMember", { chat_id: communityId, user_id: userId, only_if_banned: true });
  }

  async sendMessage(chatId: string, message: OutgoingMessage): Promise<number> {
    const params: Record<string, unknown> = { chat_id: chatId, text: message.text };
    if (message.choices && message.choices.length > 0) {
      params["reply_markup"] = { inline_keyboard: buildKeyboard(message.choices) };
    }
    const result = await this.call("sendMessage", params, sentMessageSchema);
    return result.message_id;
  }

  async deleteMessage(chatId: string, messageId: number): Promise<void> {
    await this.call("deleteMessage", { chat_id: chatId, message_id: messageId });
  }

  async getProfilePhotoCount(userId: number): Promise<number> {
    const result = await this.call("getUserProfilePhotos", { user_id: userId, limit: 1 }, profilePhotosSchema);
    return result.total_count;
  }

  async getMember(communityId: string, userId: number): Promise<MemberInfo> {
    const member = await this.call("getChatMember", { chat_id: communityId, user_id: userId }, chatMemberSchema);
    return { status: member.status, account: toAccountProfile(member.user) };
  }

  async acknowledge(interactionId: string, text: string): Promise<void> {
    await this.call("answerCallbackQuery", { callback_query_id: interactionId, text, show_alert: true });
  }

  private async call(method: string, params: Record<string, unknown>): Promise<unknown>;
  private async call<T>(method: string, params: Record<string, unknown>, schema: z.ZodType<T>): Promise<T>;
  private async call<T>(
    method: string,
    params: Record<string, unknown>,
    schema?: z.ZodType<T>,
  ): Promise<T | unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/${method}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(params),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      throw new GatewayError(method, message);
    }

    const envelope = apiResponseSchema.safeParse(await response.json().catch(() => null));
    if (!envelope.success) {
      throw new GatewayError(method, `Unexpected response (HTTP ${String(response.status)})`, response.status);
    }
    if (!envelope.data.ok) {
      throw new GatewayError(
        method,
        envelope.data.description ?? "Request failed",
        envelope.data.error_code ?? response.status,
      );
    }

    if (!schema) {
      return envelope.data.result;
    }

    const parsed = schema.safeParse(envelope.data.result);
    if (!parsed.success) {
      this.logger.warn({ method }, "Telegram returned an unexpected result shape");
      throw new GatewayError(method, "Unexpected result shape");
    }
    return parsed.data;
  }
}

function buildKeyboard(choices: string[]): Array<Array<{ text: string; callback_data: string }>> {
  const rows: Array<Array<{ text: string; callback_data: string }>> = [];
  for (let i = 0; i < choices.length; i += CHOICES_PER_ROW) {
    rows.push(
      choices
        .slice(i, i + CHOICES_PER_ROW)
        .map((choice) => ({ text: choice, callback_data: `${ANSWER_CALLBACK_PREFIX}${choice}` })),
    );
  }
  return rows;
}
