import path from 'path';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { WeatherSnapshot, WeatherSnapshotSchema } from '@/schemas/weather.schema';
import { NotFoundError, ValidationError, errorMessage } from '@/utils/errors';

const pad2 = (n: number) => String(n).padStart(2, '0');

/** `weather_20261019_133005.json` */
export function defaultFixtureName(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `weather_${date}_${time}.json`;
}

function withJsonExtension(filename: string): string {
  return filename.endsWith('.json') ? filename : `${filename}.json`;
}

export async function saveWeatherData(
  data: WeatherSnapshot,
  filename: string | undefined,
  directory: string,
): Promise<string> {
  await mkdir(directory, { recursive: true });
  const target = path.resolve(directory, withJsonExtension(filename ?? defaultFixtureName()));
  await writeFile(target, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
  return target;
}

export async function loadWeatherData(
  filename: string,
  directory: string,
): Promise<WeatherSnapshot> {
  const source = path.resolve(directory, withJsonExtension(filename));

  let text: string;
  try {
    text = await readFile(source, 'utf8');
  } catch {
    throw new NotFoundError(`Weather data file not found: ${source}`);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Weather data file is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = WeatherSnapshotSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ValidationError(`Weather data file is not a weather snapshot: ${source}`);
  }
  return parsed.data;
}
