import {
  AlertBlock,
  DayBlock,
  HourBlock,
  WeatherCondition,
  WeatherSnapshot,
  YesterdaySummary,
} from '@/schemas/weather.schema';
import {
  NOT_AVAILABLE,
  UV_RELEVANCE_THRESHOLD,
  describePrecipitation,
  describeUvi,
  describeWind,
  formatTemperature,
  percentOf,
} from '@/utils/weather-descriptions';
import {
  clockTime,
  dayName,
  floorToQuarterHour,
  isoDateTime,
  longDateTime,
  shiftDate,
  toLocalDate,
} from '@/utils/time-format';

export interface IFormatOptions {
  now?: Date;
  unitSymbol?: string;
}

const HOURS_AHEAD = 8;
const EXTENDED_DAYS_END = 5;
const FEELS_LIKE_THRESHOLD = 5;

export function firstCondition(
  weather: WeatherCondition[] | undefined,
): WeatherCondition {
  return weather?.[0] ?? {};
}

function clockAt(timestamp: number | undefined, offset: number): string {
  return timestamp === undefined ? NOT_AVAILABLE : clockTime(toLocalDate(timestamp, offset));
}

function dayNameAt(timestamp: number | undefined, offset: number): string {
  return timestamp === undefined ? NOT_AVAILABLE : dayName(toLocalDate(timestamp, offset));
}

function dateTimeAt(timestamp: number | undefined, offset: number): string {
  return timestamp === undefined ? NOT_AVAILABLE : isoDateTime(toLocalDate(timestamp, offset));
}

function yesterdaySection(yesterday: YesterdaySummary, unit: string): string[] {
  return [
    `\nYESTERDAY'S WEATHER (${yesterday.date}):`,
    `  Average Temperature: ${formatTemperature(yesterday.avg_temp, unit)} ` +
      `(felt like ${formatTemperature(yesterday.avg_feels_like, unit)})`,
    `  High: ${formatTemperature(yesterday.high_temp, unit)}, ` +
      `Low: ${formatTemperature(yesterday.low_temp, unit)}`,
    `  Main Condition: ${yesterday.main_condition}`,
  ];
}

function alertsSection(alerts: AlertBlock[], offset: number): string[] {
  return [
    '\nACTIVE WEATHER ALERTS:',
    ...alerts.map(
      (alert) =>
        `- ${alert.event ?? NOT_AVAILABLE} from ${alert.sender_name ?? NOT_AVAILABLE}: ` +
        `${alert.description ?? 'No description'} ` +
        `(Effective: ${dateTimeAt(alert.start, offset)} to ${dateTimeAt(alert.end, offset)})`,
    ),
  ];
}

function currentSection(snapshot: WeatherSnapshot, offset: number, unit: string): string[] {
  const current = snapshot.current ?? {};
  const lines = ['\nTODAY\'S FORECAST:'];

  const description = firstCondition(current.weather).description ?? 'Not available';
  let rightNow = `  Right Now: ${description} at ${formatTemperature(current.temp, unit)}`;
  if (
    current.temp !== undefined &&
    current.feels_like !== undefined &&
    Math.abs(Math.round(current.temp) - Math.round(current.feels_like)) > FEELS_LIKE_THRESHOLD
  ) {
    rightNow += ` (feels like ${formatTemperature(current.feels_like, unit)})`;
  }
  lines.push(rightNow);

  const rain = current.rain?.['1h'];
  const snow = current.snow?.['1h'];
  if (rain) {
    lines.push(`  Current Precipitation: raining (${rain} mm/hr).`);
  } else if (snow) {
    lines.push(`  Current Precipitation: snowing (${snow} mm/hr).`);
  } else {
    lines.push('  Current Precipitation: none.');
  }

  lines.push(`  Current Wind: ${describeWind(current.wind_speed, current.wind_gust)}`);
  lines.push(`  Current UV Index: ${describeUvi(current.uvi)}`);
  lines.push(
    `  Sunrise: ${clockAt(current.sunrise, offset)}, Sunset: ${clockAt(current.sunset, offset)}.`,
  );
  return lines;
}

function todaySection(today: DayBlock, offset: number, unit: string): string[] {
  return [
    `\n  Overall for Today (${dayNameAt(today.dt, offset)}): ${today.summary ?? 'No summary available.'}`,
    `  High: ${formatTemperature(today.temp?.max, unit)}, ` +
      `Low for tonight: ${formatTemperature(today.temp?.min, unit)}.`,
    `  Precipitation: ${describePrecipitation(today)}`,
    `  Day Wind: ${describeWind(today.wind_speed, today.wind_gust)}`,
  ];
}

function hourLine(hour: HourBlock, offset: number, unit: string): string {
  let line =
    `  ${clockAt(hour.dt, offset)}: ` +
    `${firstCondition(hour.weather).description ?? NOT_AVAILABLE} ` +
    `at ${formatTemperature(hour.temp, unit)}`;
  if (hour.uvi !== undefined && hour.uvi >= UV_RELEVANCE_THRESHOLD) {
    line += ` (UV ${describeUvi(hour.uvi)})`;
  }
  if (hour.pop) {
    const details = [`${percentOf(hour.pop)}% chance precip`];
    const rain = hour.rain?.['1h'];
    const snow = hour.snow?.['1h'];
    if (rain) details.push(`${rain}mm rain`);
    if (snow) details.push(`${snow}mm snow`);
    line += ` (${details.join(', ')})`;
  }
  return line;
}

function extendedSection(daily: DayBlock[], offset: number, unit: string): string[] {
  const lines = ['\nNEXT FEW DAYS (for daily_forecasts - use these exact day names):'];
  if (daily.length < 2) {
    lines.push('  No extended forecast available.');
    return lines;
  }
  for (const day of daily.slice(1, EXTENDED_DAYS_END)) {
    lines.push(
      `\n  ${dayNameAt(day.dt, offset)}:`,
      `    Summary: ${day.summary ?? 'No summary available.'}`,
      `    High: ${formatTemperature(day.temp?.max, unit)}, Low: ${formatTemperature(day.temp?.min, unit)}.`,
      `    Precipitation: ${describePrecipitation(day)}`,
      `    Wind: ${describeWind(day.wind_speed, day.wind_gust)}`,
    );
  }
  return lines;
}

/**
 * Renders a snapshot as the plain-text context handed to the model.
 *
 * The clock line is floored to the quarter hour so identical weather
 * produces identical context (and therefore the same LLM cache key) for
 * requests made within the same fifteen minutes.
 */
export function formatForLlm(
  snapshot: WeatherSnapshot,
  yesterday?: YesterdaySummary | null,
  options: IFormatOptions = {},
): string {
  const offset = snapshot.timezone_offset ?? 0;
  const unit = options.unitSymbol ?? '°F';
  const localNow = floorToQuarterHour(shiftDate(options.now ?? new Date(), offset));

  const lines = [`Current Date and Time: ${longDateTime(localNow)}`];

  if (yesterday) {
    lines.push(...yesterdaySection(yesterday, unit));
  }

  const alerts = snapshot.alerts ?? [];
  if (alerts.length > 0) {
    lines.push(...alertsSection(alerts, offset));
  }

  lines.push(...currentSection(snapshot, offset, unit));

  const daily = snapshot.daily ?? [];
  if (daily.length > 0) {
    lines.push(...todaySection(daily[0], offset, unit));
  }

  const hourly = snapshot.hourly ?? [];
  if (hourly.length > 0) {
    lines.push(
      '\nNEXT 8 HOURS:',
      ...hourly.slice(0, HOURS_AHEAD).map((hour) => hourLine(hour, offset, unit)),
    );
  }

  lines.push(...extendedSection(daily, offset, unit));

  return lines.join('\n');
}
