import { Injectable } from '@nestjs/common';
import { WeatherService } from './weather.service';
import { WeatherComparisonService } from './weather-comparison.service';
import {
  ComparisonResult,
  FetchOptions,
  WeatherFailure,
  WeatherResult,
  parseUnitSystem,
} from './interfaces/weather.interface';

export const WEATHER_TOOLS = ['get_weather', 'compare_weather'] as const;

/**
 * Punto de entrada para los anfitriones (HTTP, Telegram): acepta argumentos
 * sin tipar, los normaliza y siempre devuelve un valor serializable.
 */
@Injectable()
export class WeatherToolsService {
  constructor(
    private readonly weatherService: WeatherService,
    private readonly comparisonService: WeatherComparisonService,
  ) {}

  getWeather(
    city: unknown,
    units?: unknown,
    detailed?: unknown,
    options?: FetchOptions,
  ): Promise<WeatherResult> {
    return this.weatherService.getWeather(
      {
        city: typeof city === 'string' ? city : '',
        unitSystem: parseUnitSystem(units),
        detailed: parseFlag(detailed),
      },
      options,
    );
  }

  compareWeather(
    cities: unknown,
    metric?: unknown,
    options?: FetchOptions,
  ): Promise<ComparisonResult | WeatherFailure> {
    return this.comparisonService.compare(
      {
        cities: parseCityList(cities),
        metric: typeof metric === 'string' && metric ? metric : undefined,
      },
      options,
    );
  }
}

export function parseFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    return ['true', '1', 'yes', 'si', 'sí'].includes(value.trim().toLowerCase());
  }
  return false;
}

/**
 * Acepta un arreglo o una cadena separada por comas. Las entradas vacías
 * se descartan; el orden se conserva.
 */
export function parseCityList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : [value];
  return items
    .filter((item): item is string => typeof item === 'string')
    .flatMap((item) => item.split(','))
    .map((city) => city.trim())
    .filter((city) => city.length > 0);
}
