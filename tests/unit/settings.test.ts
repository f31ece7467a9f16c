import path from 'path';
import { describe, expect, it } from '@jest/globals';
import {
  isProviderComplete,
  loadSettings,
  requireComplete,
  temperatureSymbol,
} from '@/config/settings';
import { ConfigurationError } from '@/utils/errors';

describe('loadSettings', () => {
  it('applies defaults', () => {
    const settings = loadSettings({});
    expect(settings.weather).toEqual({
      apiUrl: 'https://api.openweathermap.org/data/3.0/onecall',
      timemachineUrl: 'https://api.openweathermap.org/data/3.0/onecall/timemachine',
      units: 'imperial',
      apiKey: undefined,
      cacheTtlSeconds: 600,
    });
    expect(settings.defaults).toEqual({
      lat: 38.9541848,
      lon: -77.0832061,
      locationName: 'Washington, DC',
    });
    expect(settings.port).toBe(5001);
    expect(settings.llm.fallback).toBeUndefined();
    expect(settings.llm.primary.supportsJsonMode).toBe(true);
    expect(settings.paths.promptDir).toBe(path.join(settings.paths.root, 'prompts'));
  });

  it('reads overrides and coerces numbers', () => {
    const settings = loadSettings({
      WEATHER_UNITS: 'metric',
      API_CACHE_TIME: '120',
      DEFAULT_LAT: '51.5',
      DEFAULT_LON: '-0.12',
      LLM_SUPPORTS_JSON_MODE: 'false',
      PROMPT_DIR: '/srv/prompts',
      PORT: '8080',
    });
    expect(settings.weather.units).toBe('metric');
    expect(settings.weather.cacheTtlSeconds).toBe(120);
    expect(settings.llm.cacheTtlSeconds).toBe(120);
    expect(settings.defaults.lat).toBe(51.5);
    expect(settings.defaults.lon).toBe(-0.12);
    expect(settings.llm.primary.supportsJsonMode).toBe(false);
    expect(settings.paths.promptDir).toBe('/srv/prompts');
    expect(settings.port).toBe(8080);
  });

  it('treats blank values as unset', () => {
    expect(loadSettings({ LLM_API_KEY: '  ' }).llm.primary.apiKey).toBeUndefined();
  });

  it('configures a fallback when any fallback variable is set', () => {
    const settings = loadSettings({ FALLBACK_LLM_MODEL: 'backup' });
    expect(settings.llm.fallback).toEqual({
      label: 'fallback',
      apiUrl: undefined,
      apiKey: undefined,
      model: 'backup',
      supportsJsonMode: true,
    });
  });

  it('rejects invalid values with a configuration error', () => {
    expect(() => loadSettings({ WEATHER_UNITS: 'kelvin' })).toThrow(ConfigurationError);
    expect(() => loadSettings({ DEFAULT_LAT: '95' })).toThrow(/DEFAULT_LAT/);
  });
});

describe('provider helpers', () => {
  it('names the missing fields', () => {
    const provider = { label: 'primary' as const, apiUrl: 'https://llm.test', supportsJsonMode: true };
    expect(isProviderComplete(provider)).toBe(false);
    expect(() => requireComplete(provider)).toThrow(
      'Missing api key, model for primary LLM provider',
    );
  });

  it('returns a complete provider unchanged', () => {
    const provider = {
      label: 'fallback' as const,
      apiUrl: 'https://llm.test',
      apiKey: 'test-secret',
      model: 'm',
      supportsJsonMode: false,
    };
    expect(requireComplete(provider)).toEqual(provider);
  });

  it('maps units to symbols', () => {
    expect(temperatureSymbol('imperial')).toBe('°F');
    expect(temperatureSymbol('metric')).toBe('°C');
    expect(temperatureSymbol('standard')).toBe('K');
  });
});
