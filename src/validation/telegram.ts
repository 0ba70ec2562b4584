import { z } from "zod/v4";
import type { AccountProfile } from "../gateway/types.js";

// ---------------------------------------------------------------------------
// Telegram Bot API objects (only the fields the protection core reads)
// ---------------------------------------------------------------------------

export const telegramUserSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean(),
  first_name: z.string(),
  last_name: z.string().optional(),
  username: z.string().optional(),
  language_code: z.string().optional(),
  is_premium: z.boolean().optional(),
});

export type TelegramUser = z.infer<typeof telegramUserSchema>;

export const telegramChatSchema = z.object({
  id: z.number().int(),
  type: z.enum(["private", "group", "supergroup", "channel"]),
  title: z.string().optional(),
  username: z.string().optional(),
});

const memberStatusSchema = z.enum(["creator", "administrator", "member", "restricted", "left", "kicked"]);

export const chatMemberSchema = z.object({
  status: memberStatusSchema,
  user: telegramUserSchema,
  // Only present on "restricted"
  is_member: z.boolean().optional(),
});

export const chatMemberUpdatedSchema = z.object({
  chat: telegramChatSchema,
  from: telegramUserSchema,
  date: z.number().int(),
  old_chat_member: chatMemberSchema,
  new_chat_member: chatMemberSchema,
});

export const messageSchema = z.object({
  message_id: z.number().int(),
  chat: telegramChatSchema,
  from: telegramUserSchema.optional(),
  text: z.string().optional(),
  caption: z.string().optional(),
  new_chat_members: z.array(telegramUserSchema).optional(),
  left_chat_member: telegramUserSchema.optional(),
});

export const callbackQuerySchema = z.object({
  id: z.string(),
  from: telegramUserSchema,
  message: messageSchema.optional(),
  data: z.string().optional(),
});

export const updateSchema = z.object({
  update_id: z.number().int(),
  message: messageSchema.optional(),
  chat_member: chatMemberUpdatedSchema.optional(),
  callback_query: callbackQuerySchema.optional(),
});

export type TelegramUpdate = z.infer<typeof updateSchema>;
export type ChatMemberUpdated = z.infer<typeof chatMemberUpdatedSchema>;
export type TelegramMessage = z.infer<typeof messageSchema>;

// ---------------------------------------------------------------------------
// API envelopes
// ---------------------------------------------------------------------------

export const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().int().optional(),
});

export const sentMessageSchema = z.object({ message_id: z.number().int() });

export const profilePhotosSchema = z.object({ total_count: z.number().int().min(0) });

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function toAccountProfile(user: TelegramUser): AccountProfile {
  return {
    id: user.id,
    isBot: user.is_bot,
    isPremium: user.is_premium ?? false,
    username: user.username ?? null,
    firstName: user.first_name,
    lastName: user.last_name ?? null,
    languageCode: user.language_code ?? null,
  };
}

const PRESENT_STATUSES = new Set(["creator", "administrator", "member"]);

/**
 * Whether a membership change is a fresh join: the user was not in the chat
 * before and is now.
 */
export function isJoin(update: ChatMemberUpdated): boolean {
  const wasPresent =
    PRESENT_STATUSES.has(update.old_chat_member.status) ||
    (update.old_chat_member.status === "restricted" && update.old_chat_member.is_member === true);
  const isPresent =
    update.new_chat_member.status === "member" ||
    (update.new_chat_member.status === "restricted" && update.new_chat_member.is_member === true);
  return !wasPresent && isPresent;
}
