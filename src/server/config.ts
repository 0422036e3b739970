import { z } from 'zod';
import type { CityInfo } from '../types';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_PATH: z.string().min(1).default('climate.db'),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  OPEN_METEO_BASE_URL: z.string().url().default('https://api.open-meteo.com/v1'),
  OPEN_METEO_AIR_QUALITY_URL: z.string().url().default('https://air-quality-api.open-meteo.com/v1'),
  CITY_NAME: z.string().min(1).default('Bengaluru'),
  CITY_LATITUDE: z.coerce.number().min(-90).max(90).default(12.9716),
  CITY_LONGITUDE: z.coerce.number().min(-180).max(180).default(77.5946),
  CITY_TIMEZONE: z.string().min(1).default('Asia/Kolkata'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  HTTP_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  HTTP_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  SNAPSHOT_MAX_AGE_MINUTES: z.coerce.number().positive().default(180),
});

export interface HttpSettings {
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
}

export interface AppConfig {
  port: number;
  host: string;
  env: 'development' | 'production' | 'test';
  databasePath: string;
  gemini: { apiKey: string | null; model: string };
  openMeteo: { forecastUrl: string; airQualityUrl: string };
  city: CityInfo;
  http: HttpSettings;
  snapshotMaxAgeMinutes: number;
}

/** Read settings from the environment. Throws with the offending variables listed when a value is invalid. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset so `FOO=` in a shell falls back to the default.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    env: e.NODE_ENV,
    databasePath: e.DATABASE_PATH,
    gemini: { apiKey: e.GEMINI_API_KEY ?? null, model: e.GEMINI_MODEL },
    openMeteo: { forecastUrl: e.OPEN_METEO_BASE_URL, airQualityUrl: e.OPEN_METEO_AIR_QUALITY_URL },
    city: { name: e.CITY_NAME, latitude: e.CITY_LATITUDE, longitude: e.CITY_LONGITUDE, timezone: e.CITY_TIMEZONE },
    http: { timeoutMs: e.HTTP_TIMEOUT_MS, maxRetries: e.HTTP_MAX_RETRIES, backoffMs: e.HTTP_BACKOFF_MS },
    snapshotMaxAgeMinutes: e.SNAPSHOT_MAX_AGE_MINUTES,
  };
}
