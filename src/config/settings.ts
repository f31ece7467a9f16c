import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '@/utils/errors';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => (value ?? 'true').toLowerCase() === 'true');

const EnvSchema = z.object({
  WEATHER_API_URL: z
    .string()
    .url()
    .default('https://api.openweathermap.org/data/3.0/onecall'),
  WEATHER_TIMEMACHINE_API_URL: z
    .string()
    .url()
    .default('https://api.openweathermap.org/data/3.0/onecall/timemachine'),
  WEATHER_UNITS: z.enum(['standard', 'metric', 'imperial']).default('imperial'),
  API_CACHE_TIME: z.coerce.number().int().min(0).default(600),
  WEATHER_API_KEY: optionalString,
  LLM_API_URL: optionalString,
  LLM_API_KEY: optionalString,
  LLM_MODEL: optionalString,
  LLM_SUPPORTS_JSON_MODE: booleanFlag,
  FALLBACK_LLM_API_URL: optionalString,
  FALLBACK_LLM_API_KEY: optionalString,
  FALLBACK_LLM_MODEL: optionalString,
  FALLBACK_LLM_SUPPORTS_JSON_MODE: booleanFlag,
  DEFAULT_LAT: z.coerce.number().min(-90).max(90).default(38.9541848),
  DEFAULT_LON: z.coerce.number().min(-180).max(180).default(-77.0832061),
  DEFAULT_LOCATION: z.string().default('Washington, DC'),
  PROMPT_DIR: optionalString,
  CACHE_DB: optionalString,
  LLM_LOG_DB: optionalString,
  TEST_DATA_DIR: optionalString,
  PORT: z.coerce.number().int().positive().default(5001),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export type WeatherUnits = z.infer<typeof EnvSchema>['WEATHER_UNITS'];

export interface ILlmProviderSettings {
  label: 'primary' | 'fallback';
  apiUrl?: string;
  apiKey?: string;
  model?: string;
  supportsJsonMode: boolean;
}

export interface IWeatherApiSettings {
  apiUrl: string;
  timemachineUrl: string;
  units: WeatherUnits;
  apiKey?: string;
  cacheTtlSeconds: number;
}

export interface ISettings {
  weather: IWeatherApiSettings;
  llm: {
    primary: ILlmProviderSettings;
    fallback?: ILlmProviderSettings;
    cacheTtlSeconds: number;
  };
  defaults: {
    lat: number;
    lon: number;
    locationName: string;
  };
  paths: {
    root: string;
    promptDir: string;
    cacheDb: string;
    llmLogDb: string;
    testDataDir: string;
  };
  port: number;
  logLevel: string;
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
): ISettings {
  if (env === process.env) {
    dotenv.config();
  }

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigurationError(`Invalid environment configuration (${details})`);
  }
  const e = parsed.data;

  const hasFallback = Boolean(
    e.FALLBACK_LLM_API_URL || e.FALLBACK_LLM_API_KEY || e.FALLBACK_LLM_MODEL,
  );

  return {
    weather: {
      apiUrl: e.WEATHER_API_URL,
      timemachineUrl: e.WEATHER_TIMEMACHINE_API_URL,
      units: e.WEATHER_UNITS,
      apiKey: e.WEATHER_API_KEY,
      cacheTtlSeconds: e.API_CACHE_TIME,
    },
    llm: {
      primary: {
        label: 'primary',
        apiUrl: e.LLM_API_URL,
        apiKey: e.LLM_API_KEY,
        model: e.LLM_MODEL,
        supportsJsonMode: e.LLM_SUPPORTS_JSON_MODE,
      },
      fallback: hasFallback
        ? {
            label: 'fallback',
            apiUrl: e.FALLBACK_LLM_API_URL,
            apiKey: e.FALLBACK_LLM_API_KEY,
            model: e.FALLBACK_LLM_MODEL,
            supportsJsonMode: e.FALLBACK_LLM_SUPPORTS_JSON_MODE,
          }
        : undefined,
      cacheTtlSeconds: e.API_CACHE_TIME,
    },
    defaults: {
      lat: e.DEFAULT_LAT,
      lon: e.DEFAULT_LON,
      locationName: e.DEFAULT_LOCATION,
    },
    paths: {
      root: PROJECT_ROOT,
      promptDir: e.PROMPT_DIR ?? path.join(PROJECT_ROOT, 'prompts'),
      cacheDb: e.CACHE_DB ?? path.join(PROJECT_ROOT, 'api_cache', 'cache.sqlite3'),
      llmLogDb: e.LLM_LOG_DB ?? path.join(PROJECT_ROOT, 'llm_log.sqlite3'),
      testDataDir: e.TEST_DATA_DIR ?? path.join(PROJECT_ROOT, 'test_data'),
    },
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  };
}

export function temperatureSymbol(units: WeatherUnits): string {
  if (units === 'metric') return '°C';
  if (units === 'standard') return 'K';
  return '°F';
}

export function isProviderComplete(provider: ILlmProviderSettings): boolean {
  return Boolean(provider.apiUrl && provider.apiKey && provider.model);
}

export interface ICompleteLlmProvider extends ILlmProviderSettings {
  apiUrl: string;
  apiKey: string;
  model: string;
}

export function requireComplete(
  provider: ILlmProviderSettings,
): ICompleteLlmProvider {
  const { apiUrl, apiKey, model } = provider;
  if (apiUrl && apiKey && model) {
    return { ...provider, apiUrl, apiKey, model };
  }
  const missing = [
    apiUrl ? null : 'api url',
    apiKey ? null : 'api key',
    model ? null : 'model',
  ].filter((field): field is string => field !== null);
  throw new ConfigurationError(
    `Missing ${missing.join(', ')} for ${provider.label} LLM provider`,
  );
}
