import { ISettings, loadSettings } from '@/config/settings';

export const PRIMARY_URL = 'https://llm.test';
export const PRIMARY_PATH = '/v1/chat/completions';
export const FALLBACK_URL = 'https://fallback.test';
export const FALLBACK_PATH = '/v1/chat/completions';

export const BASE_ENV: NodeJS.ProcessEnv = {
  WEATHER_API_KEY: 'test-weather-key',
  LLM_API_URL: `${PRIMARY_URL}${PRIMARY_PATH}`,
  LLM_API_KEY: 'test-secret',
  LLM_MODEL: 'primary-model',
  LOG_LEVEL: 'silent',
};

export const FALLBACK_ENV: NodeJS.ProcessEnv = {
  FALLBACK_LLM_API_URL: `${FALLBACK_URL}${FALLBACK_PATH}`,
  FALLBACK_LLM_API_KEY: 'test-fallback-secret',
  FALLBACK_LLM_MODEL: 'fallback-model',
};

export function buildSettings(env: NodeJS.ProcessEnv = {}): ISettings {
  return loadSettings({ ...BASE_ENV, ...env });
}
