/**
 * Trendwire — Settings
 *
 * Process configuration read from the environment (and `.env` via dotenv),
 * validated with zod. All variables are optional; defaults match a
 * three-source deployment refreshing every 15 minutes.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../lib/errors';

// ============================================================
// SCHEMA
// ============================================================

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const sourceList = z
  .string()
  .default('reddit,hackernews,github')
  .transform(value =>
    value
      .split(',')
      .map(part => part.trim())
      .filter(part => part.length > 0)
  );

export const SettingsSchema = z.object({
  APP_NAME: z.string().trim().min(1).default('Trendwire'),
  APP_TRENDING_DEFAULT_LIMIT: positiveInt(10),
  APP_TRENDING_REFRESH_SECONDS: positiveInt(900),
  APP_TRENDING_SOURCES: sourceList,
  APP_HTTP_TIMEOUT_SECONDS: positiveInt(10),
  PORT: positiveInt(8000),
});

export interface Settings {
  appName: string;
  trendingDefaultLimit: number;
  trendingRefreshSeconds: number;
  /** Ordered source names; order is the merge tie-break */
  trendingSources: string[];
  httpTimeoutSeconds: number;
  port: number;
}

// ============================================================
// LOADING
// ============================================================

/**
 * Parse settings from an environment map.
 * Empty strings count as unset so `FOO=` in .env falls back to the default.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(SettingsSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value;
    }
  }

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  return {
    appName: data.APP_NAME,
    trendingDefaultLimit: data.APP_TRENDING_DEFAULT_LIMIT,
    trendingRefreshSeconds: data.APP_TRENDING_REFRESH_SECONDS,
    trendingSources: data.APP_TRENDING_SOURCES,
    httpTimeoutSeconds: data.APP_HTTP_TIMEOUT_SECONDS,
    port: data.PORT,
  };
}
