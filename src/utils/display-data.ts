import { WeatherSnapshot } from '@/schemas/weather.schema';
import { IAlertSummary, IDisplayData, IForecastDay } from '@/types';
import { NOT_AVAILABLE, roundOrNull } from '@/utils/weather-descriptions';
import { firstCondition } from '@/utils/weather-formatter';
import {
  dayName,
  hourOnly,
  sameCalendarDay,
  shiftDate,
  shortDayName,
  toLocalDate,
} from '@/utils/time-format';

const FORECAST_DAYS = 5;

// Same-day alerts read `3PM`; anything else carries the weekday, `3PM Tue`.
export function formatAlertTime(
  timestamp: number,
  offsetSeconds: number,
  now: Date = new Date(),
): string {
  const local = toLocalDate(timestamp, offsetSeconds);
  const today = shiftDate(now, offsetSeconds);
  return sameCalendarDay(local, today)
    ? hourOnly(local)
    : `${hourOnly(local)} ${shortDayName(local)}`;
}

/** Picks out what the CLI and the JSON API show next to the narrative. */
export function extractDisplayData(
  snapshot: WeatherSnapshot,
  now: Date = new Date(),
): IDisplayData {
  const offset = snapshot.timezone_offset ?? 0;
  const current = snapshot.current ?? {};
  const daily = snapshot.daily ?? [];

  const alerts: IAlertSummary[] = (snapshot.alerts ?? []).map((alert) => ({
    event: alert.event ?? 'Weather Alert',
    start: alert.start !== undefined ? formatAlertTime(alert.start, offset, now) : NOT_AVAILABLE,
    end: alert.end !== undefined ? formatAlertTime(alert.end, offset, now) : NOT_AVAILABLE,
  }));

  const forecastDays: IForecastDay[] = daily.slice(0, FORECAST_DAYS).map((day) => {
    const condition = firstCondition(day.weather);
    return {
      day: day.dt !== undefined ? dayName(toLocalDate(day.dt, offset)) : 'Unknown',
      high: roundOrNull(day.temp?.max),
      low: roundOrNull(day.temp?.min),
      conditions: condition.description ?? null,
      precip_prob: Math.round((day.pop ?? 0) * 100),
      icon: condition.icon ?? null,
    };
  });

  const today = daily[0];
  const high = today ? today.temp?.max : current.temp;
  const low = today ? today.temp?.min : current.temp;
  const condition = firstCondition(current.weather);

  return {
    current: {
      temp: roundOrNull(current.temp),
      feels_like: roundOrNull(current.feels_like),
      conditions: condition.description ?? '',
      icon: condition.icon ?? '',
    },
    forecast: {
      high_temp: roundOrNull(high),
      low_temp: roundOrNull(low),
    },
    alerts,
    daily_forecast_raw: forecastDays,
  };
}
