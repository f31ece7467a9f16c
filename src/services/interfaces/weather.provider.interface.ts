import { WeatherSnapshot, YesterdaySummary } from '@/schemas/weather.schema';

export interface IWeatherProvider {
  fetchCurrent(lat: number, lon: number): Promise<WeatherSnapshot>;
  fetchYesterdaySummary(
    lat: number,
    lon: number,
    now?: Date,
  ): Promise<YesterdaySummary | null>;
}
