export type UnitSystem = 'metric' | 'imperial';

export type UnitKind = 'temperature' | 'wind';

export type ComparisonMetric = 'temperature' | 'humidity' | 'wind';

export interface WeatherQuery {
  city: string;
  unitSystem?: UnitSystem;
  detailed?: boolean;
}

export interface CurrentConditions {
  city: string;
  temperature: string;
  condition: string;
  humidityPercent: string;
  wind: string;
}

export interface ForecastDay {
  date: string;
  maxTemp: string;
  minTemp: string;
  condition: string;
}

export interface WeatherSuccess extends CurrentConditions {
  forecast?: ForecastDay[];
}

export interface WeatherFailure {
  error: string;
}

export type WeatherResult = WeatherSuccess | WeatherFailure;

export interface ComparisonRequest {
  cities: string[];
  metric?: string;
}

export type CitySummary = Pick<
  CurrentConditions,
  'city' | 'temperature' | 'humidityPercent' | 'wind'
>;

export interface ComparisonResult {
  metric: string;
  cities: CitySummary[];
}

export interface FetchOptions {
  signal?: AbortSignal;
}

export function isWeatherFailure(
  result: WeatherResult | ComparisonResult,
): result is WeatherFailure {
  return 'error' in result;
}

export function parseUnitSystem(value: unknown): UnitSystem {
  return value === 'imperial' ? 'imperial' : 'metric';
}
