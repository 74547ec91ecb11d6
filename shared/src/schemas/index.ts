import { z } from 'zod';

// Discord ids are 64-bit snowflakes. JSON numbers above 2^53 were already
// rounded by JSON.parse, so only ids that survived exactly are accepted.
export const SnowflakeSchema = z
  .union([
    z.string().regex(/^\d+$/),
    z
      .number()
      .int()
      .nonnegative()
      .refine(Number.isSafeInteger, 'Numeric id is too large to be exact; send it as a string'),
  ])
  .transform((value) => String(value));

// GET /api/v1/verified
export const VerifiedResponseSchema = z.object({
  verified: z.boolean(),
  roleId: SnowflakeSchema.optional(),
  sotonLinkedDate: z.string().optional(),
  discordLinkedDate: z.string().optional(),
});

// GET /api/v1/guild/:guildId
export const GuildResponseSchema = z.object({
  roleId: SnowflakeSchema,
  approved: z.boolean().default(true),
});

// POST /api/v1/guild/register
export const RegisterGuildParamsSchema = z.object({
  guildId: SnowflakeSchema,
  name: z.string().min(1),
  icon: z.string().url().nullable(),
  createdAt: z.string(),
  ownerId: SnowflakeSchema,
  susuLink: z.string().url().nullable().optional(),
  inviteLink: z.string().url(),
  roleId: SnowflakeSchema,
  roleName: z.string().min(1),
  roleColour: z.number().int().nonnegative(),
});

export const RegisterGuildResponseSchema = z.object({
  registered: z.boolean(),
  approved: z.boolean(),
});

export type VerifiedResponse = z.infer<typeof VerifiedResponseSchema>;
export type GuildResponse = z.infer<typeof GuildResponseSchema>;
export type RegisterGuildParams = z.input<typeof RegisterGuildParamsSchema>;
export type RegisterGuildResponse = z.infer<typeof RegisterGuildResponseSchema>;
