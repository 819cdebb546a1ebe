import { Injectable, Logger } from '@nestjs/common';
import { WeatherService } from './weather.service';
import {
  CitySummary,
  ComparisonMetric,
  ComparisonRequest,
  ComparisonResult,
  CurrentConditions,
  FetchOptions,
  WeatherFailure,
  isWeatherFailure,
} from './interfaces/weather.interface';
import { parseLeadingNumber } from './utils/unit-format';

export const MIN_COMPARE_CITIES = 1;
export const MAX_COMPARE_CITIES = 5;
export const CITY_COUNT_ERROR = 'Provide 1-5 cities';

const METRIC_FIELDS: Record<ComparisonMetric, keyof CitySummary> = {
  temperature: 'temperature',
  humidity: 'humidityPercent',
  wind: 'wind',
};

function isComparisonMetric(metric: string): metric is ComparisonMetric {
  return Object.prototype.hasOwnProperty.call(METRIC_FIELDS, metric);
}

@Injectable()
export class WeatherComparisonService {
  private readonly logger = new Logger(WeatherComparisonService.name);

  constructor(private readonly weatherService: WeatherService) {}

  async compare(
    request: ComparisonRequest,
    options: FetchOptions = {},
  ): Promise<ComparisonResult | WeatherFailure> {
    const { cities } = request;
    const metric = request.metric ?? 'temperature';

    if (
      cities.length < MIN_COMPARE_CITIES ||
      cities.length > MAX_COMPARE_CITIES
    ) {
      this.logger.warn(`Comparison rejected: ${cities.length} cities given`);
      return { error: CITY_COUNT_ERROR };
    }

    const results = await Promise.all(
      cities.map((city) =>
        this.weatherService.getWeather(
          { city, unitSystem: 'metric', detailed: false },
          options,
        ),
      ),
    );

    const summaries: CitySummary[] = [];
    results.forEach((result, index) => {
      if (isWeatherFailure(result)) {
        this.logger.debug(
          `Excluding ${cities[index]} from comparison: ${result.error}`,
        );
        return;
      }
      summaries.push(this.toSummary(result));
    });

    if (!isComparisonMetric(metric)) {
      return { metric, cities: summaries };
    }

    const field = METRIC_FIELDS[metric];
    // Array.prototype.sort es estable: los empates conservan el orden de entrada
    const ranked = [...summaries].sort((a, b) =>
      compareDescending(
        parseLeadingNumber(a[field]),
        parseLeadingNumber(b[field]),
      ),
    );
    return { metric, cities: ranked };
  }

  private toSummary(conditions: CurrentConditions): CitySummary {
    return {
      city: conditions.city,
      temperature: conditions.temperature,
      humidityPercent: conditions.humidityPercent,
      wind: conditions.wind,
    };
  }
}

// Los valores sin número van al final
function compareDescending(
  a: number | undefined,
  b: number | undefined,
): number {
  if (a === undefined || b === undefined) {
    if (a === b) return 0;
    return a === undefined ? 1 : -1;
  }
  return b - a;
}
