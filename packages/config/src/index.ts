import path from 'node:path';
import { z } from 'zod';
import pino from 'pino';
import 'dotenv/config';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// ─── Environment Schema ───────────────────────────────────────────────
const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  APP_URL: z.string().url().default('http://localhost:5173'),
  SERVICE_HOST: z.string().default('localhost'),
  CARD_LAYOUT_SERVICE_PORT: z.coerce.number().int().positive().default(3010),

  // Dynamic port (overrides service-specific ports)
  PORT: z.coerce.number().int().positive().optional(),

  // Fonts
  ASSETS_DIR: z.string().default('./assets'),
  FONT_PATH: z.string().optional(),
  EMOJI_FONT_PATH: z.string().optional(),
  FALLBACK_FONT: z.string().default('Helvetica'),

  // Fit search defaults
  FIT_INITIAL_FONT_SIZE: z.coerce.number().int().positive().max(1000).default(100),
  FIT_MIN_FONT_SIZE: z.coerce.number().int().positive().default(20),
  FIT_FONT_SIZE_STEP: z.coerce.number().int().positive().default(5),
});

export type Config = z.infer<typeof envSchema>;

// ─── Parse & Validate ─────────────────────────────────────────────────
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error('Invalid environment configuration');
  }
  if (parsed.data.FIT_MIN_FONT_SIZE > parsed.data.FIT_INITIAL_FONT_SIZE) {
    throw new Error('FIT_MIN_FONT_SIZE must not exceed FIT_INITIAL_FONT_SIZE');
  }
  return parsed.data;
}

export const config = parseConfig(process.env);

// ─── Font Paths ───────────────────────────────────────────────────────
export interface FontPaths {
  primaryFontPath: string;
  emojiFontPath: string;
  fallbackFont: string;
}

export function resolveFontPaths(cfg: Config = config): FontPaths {
  const assetsDir = path.resolve(cfg.ASSETS_DIR);
  return {
    primaryFontPath: cfg.FONT_PATH ?? path.join(assetsDir, 'font.ttf'),
    emojiFontPath: cfg.EMOJI_FONT_PATH ?? path.join(assetsDir, 'NotoColorEmoji.ttf'),
    fallbackFont: cfg.FALLBACK_FONT,
  };
}

// ─── Structured Logger Factory ───────────────────────────────────────
function defaultLevel(nodeEnv: Config['NODE_ENV']): string {
  if (nodeEnv === 'production') return 'info';
  if (nodeEnv === 'test') return 'silent';
  return 'debug';
}

export function loggerOptions(cfg: Config = config): pino.LoggerOptions {
  return {
    level: cfg.LOG_LEVEL ?? defaultLevel(cfg.NODE_ENV),
    ...(cfg.NODE_ENV !== 'production' && {
      transport: { target: 'pino/file', options: { destination: 1 } },
      formatters: { level: (label: string) => ({ level: label }) },
    }),
  };
}

export function createLogger(name: string) {
  return pino({ name, ...loggerOptions() });
}

export type Logger = ReturnType<typeof createLogger>;
