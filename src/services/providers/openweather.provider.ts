import axios, { AxiosInstance } from 'axios';
import { Logger } from 'pino';
import { z } from 'zod';
import { IWeatherApiSettings } from '@/config/settings';
import {
  TimeMachineResponseSchema,
  WeatherSnapshot,
  WeatherSnapshotSchema,
  YesterdaySummary,
  YesterdaySummarySchema,
} from '@/schemas/weather.schema';
import { IWeatherProvider } from '@/services/interfaces/weather.provider.interface';
import { ICache } from '@/utils/cache';
import { makeCacheKey } from '@/utils/cache-key';
import { ConfigurationError, ProviderError, toProviderError } from '@/utils/errors';
import { longDate, toLocalDate, toUnixSeconds } from '@/utils/time-format';

const WEATHER_TIMEOUT_MS = 10_000;
// Historical data does not change, so it is kept longer.
const YESTERDAY_TTL_MULTIPLIER = 6;

const roundTo1 = (value: number | undefined): number | null =>
  value === undefined ? null : Math.round(value * 10) / 10;

/** Noon (UTC) of the calendar day before `now`. */
export function yesterdayNoon(now: Date): Date {
  return new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() - 1, 12, 0, 0),
  );
}

export class OpenWeatherProvider implements IWeatherProvider {
  constructor(
    private readonly settings: IWeatherApiSettings,
    private readonly cache: ICache<unknown> | null,
    private readonly logger: Logger,
    private readonly http: AxiosInstance = axios.create({ timeout: WEATHER_TIMEOUT_MS }),
  ) {}

  async fetchCurrent(lat: number, lon: number): Promise<WeatherSnapshot> {
    const apiKey = this.requireApiKey();
    const cacheKey = makeCacheKey('weather', [lat, lon]);

    const cached = await this.readCache(cacheKey, WeatherSnapshotSchema);
    if (cached) {
      this.logger.debug({ lat, lon }, 'Weather cache hit');
      return cached;
    }

    const body = await this.get(this.settings.apiUrl, {
      lat,
      lon,
      units: this.settings.units,
      exclude: 'minutely',
      appid: apiKey,
    });
    const parsed = WeatherSnapshotSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('response', 'Weather API', 'Weather API returned an unexpected payload');
    }

    await this.cache?.set(cacheKey, parsed.data, this.settings.cacheTtlSeconds);
    this.logger.info({ lat, lon }, 'Fetched current weather');
    return parsed.data;
  }

  /**
   * Summarizes yesterday from the single sample the time-machine endpoint
   * returns for noon. Average, high and low are all that one reading.
   */
  async fetchYesterdaySummary(
    lat: number,
    lon: number,
    now: Date = new Date(),
  ): Promise<YesterdaySummary | null> {
    const apiKey = this.requireApiKey();
    const dt = toUnixSeconds(yesterdayNoon(now));
    const cacheKey = makeCacheKey('weather_yesterday', [lat, lon, dt]);

    const cached = await this.readCache(cacheKey, YesterdaySummarySchema);
    if (cached) {
      return cached;
    }

    const body = await this.get(this.settings.timemachineUrl, {
      lat,
      lon,
      dt,
      units: this.settings.units,
      appid: apiKey,
    });
    const parsed = TimeMachineResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('response', 'Weather API', 'Time machine API returned an unexpected payload');
    }

    const entry = parsed.data.data?.[0];
    if (!entry) {
      this.logger.info({ lat, lon, dt }, 'No historical data point for yesterday');
      return null;
    }

    const temp = roundTo1(entry.temp);
    const summary: YesterdaySummary = {
      date: longDate(toLocalDate(entry.dt ?? dt, parsed.data.timezone_offset ?? 0)),
      avg_temp: temp,
      high_temp: temp,
      low_temp: temp,
      avg_feels_like: roundTo1(entry.feels_like),
      main_condition: entry.weather?.[0]?.main ?? 'Unknown',
    };

    await this.cache?.set(
      cacheKey,
      summary,
      this.settings.cacheTtlSeconds * YESTERDAY_TTL_MULTIPLIER,
    );
    return summary;
  }

  private requireApiKey(): string {
    if (!this.settings.apiKey) {
      throw new ConfigurationError(
        'WEATHER_API_KEY is required to fetch live weather data. ' +
          'Set it in the environment or pass weather data to the report builder.',
      );
    }
    return this.settings.apiKey;
  }

  private async readCache<T>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | null> {
    if (!this.cache) return null;
    const hit = await this.cache.get(key);
    if (hit === null) return null;
    const parsed = schema.safeParse(hit);
    return parsed.success ? parsed.data : null;
  }

  private async get(url: string, params: Record<string, string | number>): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(url, { params });
      return response.data;
    } catch (error) {
      const failure = toProviderError(error, 'Weather API');
      this.logger.error({ err: failure, url }, 'Weather API request failed');
      throw failure;
    }
  }
}
