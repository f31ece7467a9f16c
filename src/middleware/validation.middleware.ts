import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from '@/utils/errors';

const booleanParam = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === undefined || value === 'true' || value === '1');

// Blank values are rejected here; coercion alone would read them as 0.
const coordinate = (limit: number) =>
  z.string().trim().min(1).pipe(z.coerce.number().min(-limit).max(limit)).optional();

const WeatherQuerySchema = z
  .object({
    lat: coordinate(90),
    lon: coordinate(180),
    yesterday: booleanParam,
    model: z.string().trim().min(1).optional(),
  })
  .refine((query) => (query.lat === undefined) === (query.lon === undefined), {
    message: 'lat and lon must be provided together',
  });

export type WeatherQuery = z.infer<typeof WeatherQuerySchema>;

export function parseWeatherQuery(query: unknown): WeatherQuery {
  const parsed = WeatherQuerySchema.safeParse(query);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join(', ');
    throw new ValidationError(
      `Invalid query (${details}). Latitude must be between -90 and 90, longitude between -180 and 180.`,
    );
  }
  return parsed.data;
}

export const validateWeatherQuery = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  try {
    parseWeatherQuery(req.query);
    next();
  } catch (error) {
    next(error);
  }
};
