import path from 'path';
import { readFile } from 'fs/promises';
import { Logger } from 'pino';
import { ISettings, temperatureSymbol } from '@/config/settings';
import { LlmResult } from '@/schemas/llm.schema';
import { WeatherSnapshot, YesterdaySummary } from '@/schemas/weather.schema';
import { IInteractionLogger } from '@/services/interfaces/interaction-logger.interface';
import { ILlmClient } from '@/services/interfaces/llm.client.interface';
import { IWeatherProvider } from '@/services/interfaces/weather.provider.interface';
import { IBuildReportOptions, IDisplayData, IReport } from '@/types';
import { extractDisplayData } from '@/utils/display-data';
import { errorMessage } from '@/utils/errors';
import { isFile } from '@/utils/files';
import { lastUpdatedLabel, toLocalDate } from '@/utils/time-format';
import { formatForLlm } from '@/utils/weather-formatter';

export const FALLBACK_SYSTEM_PROMPT =
  'You are a friendly weather reporter for kids. Describe the weather below in a ' +
  'cheerful, simple way and suggest what to wear. Respond with a JSON object with ' +
  'a "description" string and a "daily_forecasts" object keyed by day name.';

const ICON_URL = (icon: string) => `https://openweathermap.org/img/wn/${icon}@4x.png`;

export interface IReportServiceDeps {
  settings: ISettings;
  weatherProvider: IWeatherProvider;
  llmClient: ILlmClient;
  interactionLogger?: IInteractionLogger | null;
  logger: Logger;
  clock?: () => Date;
}

export interface IReportOutcome {
  report: IReport;
  weatherData: WeatherSnapshot;
  llmContext: string;
  systemPrompt: string;
}

export class ReportService {
  private readonly settings: ISettings;
  private readonly weatherProvider: IWeatherProvider;
  private readonly llmClient: ILlmClient;
  private readonly interactionLogger: IInteractionLogger | null;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(deps: IReportServiceDeps) {
    this.settings = deps.settings;
    this.weatherProvider = deps.weatherProvider;
    this.llmClient = deps.llmClient;
    this.interactionLogger = deps.interactionLogger ?? null;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => new Date());
  }

  async buildReport(options: IBuildReportOptions = {}): Promise<IReport> {
    const { report } = await this.run(options);
    return report;
  }

  /** Like `buildReport`, but also hands back the inputs the model saw. */
  async run(options: IBuildReportOptions = {}): Promise<IReportOutcome> {
    const {
      includeYesterday = true,
      logInteraction = false,
      source = 'unknown',
      modelOverride,
    } = options;
    const now = this.clock();

    const weatherData =
      options.weatherDataOverride ??
      (await this.weatherProvider.fetchCurrent(
        options.lat ?? this.settings.defaults.lat,
        options.lon ?? this.settings.defaults.lon,
      ));

    const yesterday = includeYesterday ? await this.fetchYesterday(weatherData, now) : null;

    const systemPrompt = await this.resolvePrompt(options.promptOverride);
    const llmContext = formatForLlm(weatherData, yesterday, {
      now,
      unitSymbol: temperatureSymbol(this.settings.weather.units),
    });
    const llmResult = await this.llmClient.generate(llmContext, systemPrompt, {
      modelOverride,
    });

    if (logInteraction) {
      this.logInteraction(weatherData, llmContext, systemPrompt, llmResult, source);
    }

    const report = assembleReport(weatherData, llmResult, extractDisplayData(weatherData, now));
    return { report, weatherData, llmContext, systemPrompt };
  }

  /**
   * No override: `default.txt`. An override naming a file: that file.
   * Anything else is prompt text and is used exactly as given. Prompts read
   * from disk get `instructions.txt` appended when it exists.
   */
  async resolvePrompt(promptOverride?: string): Promise<string> {
    const { promptDir } = this.settings.paths;
    let prompt: string;

    if (!promptOverride) {
      const defaultFile = path.join(promptDir, 'default.txt');
      if (await isFile(defaultFile)) {
        prompt = await readFile(defaultFile, 'utf8');
      } else {
        this.logger.warn({ defaultFile }, 'Default prompt file missing, using built-in prompt');
        prompt = FALLBACK_SYSTEM_PROMPT;
      }
    } else if (await isFile(promptOverride)) {
      prompt = await readFile(promptOverride, 'utf8');
    } else {
      return promptOverride;
    }

    const instructionsFile = path.join(promptDir, 'instructions.txt');
    if (await isFile(instructionsFile)) {
      const instructions = await readFile(instructionsFile, 'utf8');
      return `${prompt}\n\n${instructions}`;
    }
    return prompt;
  }

  private async fetchYesterday(
    weatherData: WeatherSnapshot,
    now: Date,
  ): Promise<YesterdaySummary | null> {
    const { lat, lon } = weatherData;
    if (lat === undefined || lon === undefined || !this.settings.weather.apiKey) {
      return null;
    }
    try {
      return await this.weatherProvider.fetchYesterdaySummary(lat, lon, now);
    } catch (error) {
      this.logger.warn({ err: error, lat, lon }, 'Could not fetch yesterday\'s weather');
      return null;
    }
  }

  private logInteraction(
    weatherData: WeatherSnapshot,
    llmContext: string,
    systemPrompt: string,
    llmResult: LlmResult,
    source: string,
  ): void {
    if (!this.interactionLogger) return;

    const { _raw_llm_response: raw, ...parsedResult } = llmResult;
    try {
      this.interactionLogger.ensureSchema();
      const id = this.interactionLogger.log({
        weatherInput: weatherData,
        llmContext,
        systemPrompt,
        modelUsed: llmResult._model_used,
        llmOutput: { raw_llm_response: raw, parsed_result: parsedResult },
        description: llmResult.description ?? '',
        source,
        locationName: weatherData.timezone ?? this.settings.defaults.locationName,
      });
      this.logger.debug({ id, source }, 'Logged LLM interaction');
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Failed to log LLM interaction');
    }
  }
}

export function assembleReport(
  weatherData: WeatherSnapshot,
  llmResult: LlmResult,
  display: IDisplayData,
): IReport {
  const { icon } = display.current;
  const timestamp = weatherData.current?.dt;

  return {
    description: llmResult.description ?? '',
    daily_forecasts_llm: llmResult.daily_forecasts ?? {},
    temperature: display.current.temp,
    feels_like: display.current.feels_like,
    conditions: display.current.conditions,
    high_temp: display.forecast.high_temp,
    low_temp: display.forecast.low_temp,
    icon_url: icon ? ICON_URL(icon) : null,
    alerts: display.alerts.map((alert) => `${alert.event} (${alert.start} to ${alert.end})`),
    last_updated:
      timestamp !== undefined
        ? lastUpdatedLabel(toLocalDate(timestamp, weatherData.timezone_offset ?? 0))
        : 'Unknown',
    daily_forecast_raw: display.daily_forecast_raw,
    _raw_llm_response: llmResult._raw_llm_response,
    model_used: llmResult._model_used,
  };
}
