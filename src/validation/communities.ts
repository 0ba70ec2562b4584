import { z } from "zod/v4";

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

/** Community ids are Telegram chat ids ("-1001234567890") or "@public_name". */
export const communityIdSchema = z
  .string()
  .regex(/^(-?\d{1,20}|@[A-Za-z0-9_]{5,32})$/, "Community id must be a chat id or @username");

const weightSchema = z.number().int("Weights must be integers");

export const scoringWeightsPatchSchema = z
  .object({
    maxLangRisk: weightSchema,
    noLangRisk: weightSchema,
    maxIdRisk: weightSchema,
    premiumBonus: weightSchema,
    noAvatarRisk: weightSchema,
    oneAvatarRisk: weightSchema,
    noUsernameRisk: weightSchema,
    weirdNameRisk: weightSchema,
    exoticScriptRisk: weightSchema,
    randomUsernameRisk: weightSchema,
    specialCharsRisk: weightSchema,
    repeatingCharsRisk: weightSchema,
  })
  .partial()
  .strict();

const languageCodeSchema = z.string().regex(/^[a-z]{2,3}$/, "Language codes are 2-3 lowercase letters");

/** Schema for creating or updating a community (all fields optional). */
export const updateCommunitySchema = z
  .object({
    title: z.string().trim().max(255, "Title must be at most 255 characters").optional(),
    threshold: z.number().int().min(1, "Threshold must be at least 1").max(10_000).optional(),
    windowSeconds: z.number().int().min(1, "Window must be at least 1 second").max(86_400).optional(),
    protectPremium: z.boolean().optional(),
    verificationEnabled: z.boolean().optional(),
    scoringEnabled: z.boolean().optional(),
    scoringThreshold: z.number().int().min(0).max(100).optional(),
    scoringWeights: scoringWeightsPatchSchema.optional(),
    languageDistribution: z.record(languageCodeSchema, z.number().positive()).optional(),
    autoAdjustEnabled: z.boolean().optional(),
    welcomeMessage: z.string().trim().min(1).max(4096, "Welcome message is too long").nullable().optional(),
  })
  .strict();

export type UpdateCommunityInput = z.infer<typeof updateCommunitySchema>;

export const listLimitSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});
