import 'dotenv/config';

import { z } from 'zod';

import { LOG_LEVELS } from './logger.js';

const snowflake = z
  .string()
  .trim()
  .regex(/^\d*$/, 'must be a numeric Discord id')
  .optional()
  .transform((value) => (value ? BigInt(value) : 0n));

const idList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => /^\d+$/.test(entry))
  );

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const pixels = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is required'),
  DISCORD_CLIENT_ID: z.string().min(1, 'DISCORD_CLIENT_ID is required'),
  DISCORD_GUILD_ID: optionalText,
  GUILD_IDS: idList,
  ALLOWED_ROLE_ID: snowflake,
  PARTICIPANT_ROLE_ID: snowflake,
  SPECTATOR_ROLE_ID: snowflake,
  DEFAULT_BG_IMAGE_URL: optionalText.pipe(z.string().url().optional()),
  FONT_PATH: optionalText,
  FONT_URL: optionalText.pipe(z.string().url().optional()),
  FONT_SCALE: z.coerce.number().positive().default(1),
  STROKE_TITLE: pixels(5),
  STROKE_BODY: pixels(4),
  INLINE_STROKE_TITLE: z.coerce.number().int().min(0).optional(),
  INLINE_STROKE_BODY: z.coerce.number().int().min(0).optional(),
  LABEL_X: pixels(74),
  VALUE_X: pixels(360),
  BACKGROUND_ALPHA: z.coerce.number().int().min(0).max(255).default(255),
  OVERLAY_OPACITY: z.coerce.number().int().min(0).max(255).default(0),
  HISTORY_CSV_PATH: z.string().default('data/history.csv'),
  ATTENDANCE_STORAGE_PATH: optionalText,
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(LOG_LEVELS).default('info')
  )
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): Env => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
  }
  return parsed.data;
};

let cached: Env | null = null;

export const getEnv = (): Env => {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
};

/** Guilds that receive commands directly; empty means global registration. */
export const resolveCommandGuilds = (env: Env): string[] => {
  const guilds = new Set(env.GUILD_IDS);
  if (env.DISCORD_GUILD_ID) {
    guilds.add(env.DISCORD_GUILD_ID);
  }
  return [...guilds];
};
