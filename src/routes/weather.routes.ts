import { Router } from 'express';
import { WeatherController } from '@/controllers/weather.controller';
import { validateWeatherQuery } from '@/middleware/validation.middleware';
import { asyncHandler } from '@/middleware/error.middleware';

export const createWeatherRoutes = (weatherController: WeatherController) => {
  const weatherRoutes = Router();
  weatherRoutes.get(
    '/weather.json',
    validateWeatherQuery,
    asyncHandler(weatherController.getJson.bind(weatherController)),
  );
  weatherRoutes.get(
    '/weather.txt',
    validateWeatherQuery,
    asyncHandler(weatherController.getText.bind(weatherController)),
  );
  return weatherRoutes;
};
