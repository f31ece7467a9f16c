import { DailyForecasts } from '@/schemas/llm.schema';
import { WeatherSnapshot } from '@/schemas/weather.schema';

export interface IBuildReportOptions {
  lat?: number;
  lon?: number;
  promptOverride?: string; // prompt text or a path to a prompt file
  includeYesterday?: boolean;
  logInteraction?: boolean;
  source?: string; // e.g. 'web', 'cli', 'replay'
  weatherDataOverride?: WeatherSnapshot;
  modelOverride?: string;
}

export interface IForecastDay {
  day: string;
  high: number | null;
  low: number | null;
  conditions: string | null;
  precip_prob: number; // percentage
  icon: string | null;
}

export interface IAlertSummary {
  event: string;
  start: string;
  end: string;
}

export interface IDisplayData {
  current: {
    temp: number | null;
    feels_like: number | null;
    conditions: string;
    icon: string;
  };
  forecast: {
    high_temp: number | null;
    low_temp: number | null;
  };
  alerts: IAlertSummary[];
  daily_forecast_raw: IForecastDay[];
}

export interface IReport {
  description: string;
  daily_forecasts_llm: DailyForecasts;
  temperature: number | null;
  feels_like: number | null;
  conditions: string;
  high_temp: number | null;
  low_temp: number | null;
  icon_url: string | null;
  alerts: string[];
  last_updated: string;
  daily_forecast_raw: IForecastDay[];
  _raw_llm_response: string;
  model_used: string;
}
