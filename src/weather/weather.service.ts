import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import {
  FetchOptions,
  UnitSystem,
  WeatherQuery,
  WeatherResult,
  WeatherSuccess,
  parseUnitSystem,
} from './interfaces/weather.interface';
import { WttrResponseSchema } from './schemas/wttr.schema';
import { ProviderPayloadError } from './errors/provider-payload.error';
import {
  extractForecast,
  normalizeConditions,
} from './utils/weather-normalize';

export const CITY_REQUIRED = 'City name required';
export const DEFAULT_WEATHER_API_URL = 'https://wttr.in';
export const DEFAULT_WEATHER_TIMEOUT_MS = 10_000;

const UNIT_FLAGS: Record<UnitSystem, string> = {
  metric: 'm',
  imperial: 'u',
};

@Injectable()
export class WeatherService {
  private readonly logger = new Logger(WeatherService.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.baseUrl = this.configService
      .get<string>('WEATHER_API_URL', DEFAULT_WEATHER_API_URL)
      .replace(/\/+$/, '');
    const timeout = Number(this.configService.get('WEATHER_TIMEOUT_MS'));
    this.timeoutMs =
      Number.isFinite(timeout) && timeout > 0
        ? timeout
        : DEFAULT_WEATHER_TIMEOUT_MS;
  }

  /**
   * Consulta las condiciones actuales de una ciudad con una sola petición.
   * Nunca lanza: cualquier fallo vuelve como `{ error }`.
   */
  async getWeather(
    query: WeatherQuery,
    options: FetchOptions = {},
  ): Promise<WeatherResult> {
    const city = typeof query.city === 'string' ? query.city.trim() : '';
    if (!city) {
      this.logger.warn('Weather lookup rejected: empty city name');
      return { error: CITY_REQUIRED };
    }
    const unitSystem = parseUnitSystem(query.unitSystem);

    try {
      const response = await firstValueFrom(
        this.httpService.get<unknown>(
          `${this.baseUrl}/${encodeURIComponent(city)}`,
          {
            params: { format: 'j1', [UNIT_FLAGS[unitSystem]]: '' },
            timeout: this.timeoutMs,
            signal: options.signal,
          },
        ),
      );

      const parsed = WttrResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw ProviderPayloadError.fromZod(parsed.error);
      }
      const payload = parsed.data;

      const result: WeatherSuccess = normalizeConditions(
        city,
        payload.current_condition[0],
        unitSystem,
      );
      if (query.detailed) {
        result.forecast = extractForecast(payload.weather, unitSystem);
      }
      return result;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const message = `Failed to get weather for ${city}: ${reason}`;
      this.logger.error(message);
      return { error: message };
    }
  }
}
