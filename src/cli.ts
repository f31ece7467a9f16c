#!/usr/bin/env node
import path from 'path';
import { writeFile } from 'fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import { loadSettings, temperatureSymbol } from '@/config/settings';
import { IServices, createServices } from '@/container';
import { DailyForecasts } from '@/schemas/llm.schema';
import { IReport } from '@/types';
import { ValidationError, errorMessage } from '@/utils/errors';
import { loadWeatherData, saveWeatherData } from '@/utils/fixtures';
import { formatTemperature } from '@/utils/weather-descriptions';

const CLI_SOURCE = 'cli';

type Print = (line: string) => void;

interface IReportCommandOptions {
  lat?: number;
  lon?: number;
  load?: string;
  save?: string;
  saveJson?: string;
  saveTxt?: string;
  logInteractions?: boolean;
  prompt?: string;
  model?: string;
  yesterday: boolean;
}

interface IReplayCommandOptions {
  logId: number;
  prompt?: string;
  newModel?: string;
  showContext?: boolean;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseId(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

const withSuffix = (name: string, suffix: string) =>
  name.endsWith(suffix) ? name : `${name}${suffix}`;

export function renderDailyForecasts(forecasts: DailyForecasts): string[] {
  if (Array.isArray(forecasts)) {
    return forecasts.map((text, index) => `Day ${index + 1}: ${text}`);
  }
  return Object.entries(forecasts).map(([day, text]) => `${day}: ${text}`);
}

export function renderReport(report: IReport, unitSymbol = '°F'): string[] {
  const temp = (value: number | null) => formatTemperature(value, unitSymbol);
  const lines = [
    '',
    'Weather Report:',
    '',
    `Description: ${report.description}`,
    '',
    `Current Temperature: ${temp(report.temperature)} (Feels like: ${temp(report.feels_like)})`,
    `Conditions: ${report.conditions}`,
    `Today's Range: High ${temp(report.high_temp)} / Low ${temp(report.low_temp)}`,
    ...renderDailyForecasts(report.daily_forecasts_llm),
  ];
  if (report.alerts.length > 0) {
    lines.push('', `Alerts: ${report.alerts.join(', ')}`);
  }
  return lines;
}

async function runReport(services: IServices, options: IReportCommandOptions, print: Print) {
  const { settings, reportService } = services;
  if ((options.lat === undefined) !== (options.lon === undefined)) {
    throw new ValidationError('--lat and --lon must be given together.');
  }

  const weatherDataOverride = options.load
    ? await loadWeatherData(options.load, settings.paths.testDataDir)
    : undefined;

  const { report, weatherData } = await reportService.run({
    lat: options.lat,
    lon: options.lon,
    weatherDataOverride,
    includeYesterday: options.yesterday,
    logInteraction: options.logInteractions ?? false,
    source: CLI_SOURCE,
    promptOverride: options.prompt,
    modelOverride: options.model,
  });

  if (options.save && !options.load) {
    const savedTo = await saveWeatherData(weatherData, options.save, settings.paths.testDataDir);
    print(`Saved weather data to: ${savedTo}`);
  }

  renderReport(report, temperatureSymbol(settings.weather.units)).forEach((line) => print(line));

  if (options.saveJson) {
    const target = path.resolve(withSuffix(options.saveJson, '.json'));
    await writeFile(target, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
    print(`\nSaved full output to: ${target}`);
  }
  if (options.saveTxt) {
    const target = path.resolve(withSuffix(options.saveTxt, '.txt'));
    await writeFile(target, report.description, 'utf8');
    print(`\nSaved description to: ${target}`);
  }
}

async function runReplay(services: IServices, options: IReplayCommandOptions, print: Print) {
  const outcome = await services.replayService.replay({
    logId: options.logId,
    prompt: options.prompt,
    model: options.newModel,
  });
  const { record, result } = outcome;

  print(`Replaying interaction ${record.id} from ${record.timestamp} (${record.locationName ?? 'N/A'})`);
  print(`Prompt: ${outcome.promptSource}, model: ${outcome.model}`);
  if (options.showContext) {
    print('\n--- Context ---');
    print(outcome.llmContext);
  }
  print('\n--- Original description ---');
  print(record.description ?? '');
  print('\n--- New description ---');
  print(result.description ?? '');
  const forecasts = result.daily_forecasts;
  if (forecasts) {
    print('');
    renderDailyForecasts(forecasts).forEach((line) => print(line));
  }
}

/**
 * Builds the command tree. Services are created on first use so `--help`
 * never opens a database.
 */
export function createProgram(
  getServices: () => IServices = () => createServices(loadSettings()),
  print: Print = console.log,
): Command {
  const program = new Command();
  let services: IServices | null = null;
  const use = () => {
    if (!services) {
      services = getServices();
    }
    return services;
  };

  program
    .name('kids-weather')
    .description('Kid-friendly weather reports written by a language model');

  program
    .command('report')
    .description('Generate a kid-friendly weather report')
    .option('--lat <number>', 'latitude', parseNumber)
    .option('--lon <number>', 'longitude', parseNumber)
    .option('--load <name>', 'use a saved weather data file instead of the weather API')
    .option('--save <name>', 'save the fetched weather data as a test file')
    .option('--save-json <name>', 'write the full report as JSON')
    .option('--save-txt <name>', 'write the description as text')
    .option('--log-interactions', 'log the LLM interaction to the database')
    .option('--prompt <text|path>', 'system prompt text or a path to a prompt file')
    .option('--model <name>', 'LLM model to use instead of the configured one')
    .option('--no-yesterday', "skip yesterday's weather")
    .action((options: IReportCommandOptions) => runReport(use(), options, print));

  program
    .command('replay')
    .description('Replay a logged LLM interaction, optionally with a new prompt or model')
    .requiredOption('--log-id <n>', 'interaction id to replay', parseId)
    .option('--prompt <text|path>', 'new system prompt text or a path to a prompt file')
    .option('--new-model <name>', 'model to replay with')
    .option('--show-context', 'print the stored LLM context')
    .action((options: IReplayCommandOptions) => runReplay(use(), options, print));

  program.hook('postAction', () => {
    services?.close();
    services = null;
  });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
