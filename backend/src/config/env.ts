/**
 * Environment Configuration
 *
 * process.env is read in exactly one place. Optional provider keys and the
 * database URL are allowed to be absent: each absence switches the matching
 * component into its synthetic or in-memory mode instead of failing boot.
 */

import { z } from 'zod';

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((v) => v === 'true' || v === '1');

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  MONGO_URL: optionalString,
  MONGO_DB_NAME: z.string().default('city_monitor'),

  TOMTOM_API_KEY: optionalString,
  WEATHER_PROVIDER_ENABLED: booleanFlag(true),
  ML_SERVICE_URL: z.string().url().default('http://localhost:8000'),
  ROAD_NETWORK_FILE: optionalString,

  CITY_NAME: z.string().default('Almaty'),
  CITY_COUNTRY: z.string().default('KZ'),
  CITY_LAT: z.coerce.number().min(-90).max(90).default(43.2389),
  CITY_LON: z.coerce.number().min(-180).max(180).default(76.8897),
  CITY_TIMEZONE: z.string().default('Asia/Almaty'),
  CITY_UTC_OFFSET_HOURS: z.coerce.number().min(-12).max(14).default(5),
});

export type Env = z.infer<typeof EnvSchema>;

export interface CityProfile {
  name: string;
  country: string;
  lat: number;
  lon: number;
  timezone: string;
  utcOffsetHours: number;
}

/**
 * Parse and validate environment variables.
 * Throws with every offending variable listed when the environment is invalid.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

export function cityProfileFromEnv(env: Env): CityProfile {
  return {
    name: env.CITY_NAME,
    country: env.CITY_COUNTRY,
    lat: env.CITY_LAT,
    lon: env.CITY_LON,
    timezone: env.CITY_TIMEZONE,
    utcOffsetHours: env.CITY_UTC_OFFSET_HOURS,
  };
}
