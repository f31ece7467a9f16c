export const NOT_AVAILABLE = 'N/A';

export const UV_RELEVANCE_THRESHOLD = 6;
const LOW_PRECIP_PROBABILITY = 0.1;

const RAIN_INTENSITY: ReadonlyArray<[number, string]> = [
  [1, 'trace'],
  [2.5, 'light'],
  [10, 'moderate'],
];

const SNOW_INTENSITY: ReadonlyArray<[number, string]> = [
  [5, 'trace'],
  [25, 'light'],
  [75, 'moderate'],
];

export function roundOrNull(value: number | undefined | null): number | null {
  return value === undefined || value === null ? null : Math.round(value);
}

export function formatTemperature(
  value: number | undefined | null,
  unitSymbol = '°F',
): string {
  const rounded = roundOrNull(value);
  return rounded === null ? NOT_AVAILABLE : `${rounded}${unitSymbol}`;
}

// Speeds are in mph.
export function describeWind(speed?: number, gust?: number): string {
  if (speed === undefined) {
    return 'Wind data not available.';
  }
  let description: string;
  if (speed >= 25) {
    description = `Very windy, around ${speed.toFixed(0)} mph.`;
  } else if (speed >= 15) {
    description = `Windy, around ${speed.toFixed(0)} mph.`;
  } else if (speed >= 5) {
    description = `Light winds around ${speed.toFixed(0)} mph.`;
  } else if (speed > 1) {
    description = 'Mostly calm.';
  } else {
    description = 'No wind.';
  }
  if (gust !== undefined && gust > speed * 1.5 && gust > 5) {
    description += ` Gusts up to ${gust.toFixed(0)} mph.`;
  }
  return description;
}

export function describeUvi(uvi?: number): string {
  if (uvi === undefined) {
    return NOT_AVAILABLE;
  }
  const value = uvi.toFixed(1);
  if (uvi < 4) return `${value} (low)`;
  if (uvi < 6) return `${value} (moderate)`;
  if (uvi < 8) return `${value} - Mention sunscreen`;
  if (uvi < 11) return `${value} - Sunscreen is a must!`;
  return `${value} - Extreme! Sunscreen and a hat are a must!`;
}

function intensity(amount: number, tiers: ReadonlyArray<[number, string]>): string {
  const tier = tiers.find(([limit]) => amount < limit);
  return tier ? tier[1] : 'heavy';
}

export function percentOf(probability: number): number {
  return Math.trunc(probability * 100);
}

export interface IPrecipitation {
  pop?: number;
  rain?: number;
  snow?: number;
}

/** Daily precipitation outlook, e.g. `60% chance of precipitation (3mm moderate rain).` */
export function describePrecipitation({ pop, rain, snow }: IPrecipitation): string {
  if (!pop || pop < LOW_PRECIP_PROBABILITY) {
    return 'Low chance of precipitation.';
  }
  let description = `${percentOf(pop)}% chance of precipitation`;
  const amounts: string[] = [];
  if (rain) {
    amounts.push(`${rain}mm ${intensity(rain, RAIN_INTENSITY)} rain`);
  }
  if (snow) {
    amounts.push(`${snow}mm ${intensity(snow, SNOW_INTENSITY)} snow`);
  }
  if (amounts.length > 0) {
    description += ` (${amounts.join(', ')})`;
  }
  return `${description}.`;
}
