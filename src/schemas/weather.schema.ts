import { z } from 'zod';

// Provider payloads are lenient: every field is optional and unknown keys
// are kept so a cached or logged snapshot round-trips unchanged.

export const WeatherConditionSchema = z
  .object({
    id: z.number().optional(),
    main: z.string().optional(),
    description: z.string().optional(),
    icon: z.string().optional(),
  })
  .passthrough();

const HourlyVolumeSchema = z
  .object({
    '1h': z.number().optional(),
  })
  .passthrough();

export const CurrentBlockSchema = z
  .object({
    dt: z.number().optional(),
    temp: z.number().optional(),
    feels_like: z.number().optional(),
    weather: z.array(WeatherConditionSchema).optional(),
    wind_speed: z.number().optional(),
    wind_gust: z.number().optional(),
    uvi: z.number().optional(),
    sunrise: z.number().optional(),
    sunset: z.number().optional(),
    rain: HourlyVolumeSchema.optional(),
    snow: HourlyVolumeSchema.optional(),
  })
  .passthrough();

export const HourBlockSchema = CurrentBlockSchema.extend({
  pop: z.number().optional(),
});

export const DayBlockSchema = z
  .object({
    dt: z.number().optional(),
    summary: z.string().optional(),
    temp: z
      .object({
        max: z.number().optional(),
        min: z.number().optional(),
      })
      .passthrough()
      .optional(),
    weather: z.array(WeatherConditionSchema).optional(),
    pop: z.number().optional(),
    rain: z.number().optional(),
    snow: z.number().optional(),
    wind_speed: z.number().optional(),
    wind_gust: z.number().optional(),
    uvi: z.number().optional(),
  })
  .passthrough();

export const AlertBlockSchema = z
  .object({
    event: z.string().optional(),
    sender_name: z.string().optional(),
    description: z.string().optional(),
    start: z.number().optional(),
    end: z.number().optional(),
  })
  .passthrough();

export const WeatherSnapshotSchema = z
  .object({
    lat: z.number().optional(),
    lon: z.number().optional(),
    timezone: z.string().optional(),
    timezone_offset: z.number().int().optional(),
    current: CurrentBlockSchema.optional(),
    hourly: z.array(HourBlockSchema).optional(),
    daily: z.array(DayBlockSchema).optional(),
    alerts: z.array(AlertBlockSchema).optional(),
  })
  .passthrough();

export const TimeMachineResponseSchema = z
  .object({
    timezone_offset: z.number().int().optional(),
    data: z.array(HourBlockSchema).optional(),
  })
  .passthrough();

export const YesterdaySummarySchema = z.object({
  date: z.string(),
  avg_temp: z.number().nullable(),
  high_temp: z.number().nullable(),
  low_temp: z.number().nullable(),
  avg_feels_like: z.number().nullable(),
  main_condition: z.string(),
});

export type WeatherCondition = z.infer<typeof WeatherConditionSchema>;
export type CurrentBlock = z.infer<typeof CurrentBlockSchema>;
export type HourBlock = z.infer<typeof HourBlockSchema>;
export type DayBlock = z.infer<typeof DayBlockSchema>;
export type AlertBlock = z.infer<typeof AlertBlockSchema>;
export type WeatherSnapshot = z.infer<typeof WeatherSnapshotSchema>;
export type YesterdaySummary = z.infer<typeof YesterdaySummarySchema>;
