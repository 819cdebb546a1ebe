import {
  ComparisonMetric,
  ComparisonResult,
  UnitSystem,
  WeatherFailure,
  WeatherResult,
  isWeatherFailure,
} from '../weather/interfaces/weather.interface';
import { escapeMarkdownV2 } from '../utils/telegram-format';

export interface ClimaArgs {
  city: string;
  units: UnitSystem;
  detailed: boolean;
}

export interface CompararArgs {
  cities: string[];
  metric?: ComparisonMetric;
}

const UNIT_WORDS: Record<string, UnitSystem> = {
  imperial: 'imperial',
  metrico: 'metric',
  métrico: 'metric',
  metric: 'metric',
};

const DETAIL_WORDS = ['detalle', 'detallado', 'pronostico', 'pronóstico'];

const METRIC_WORDS: Record<string, ComparisonMetric> = {
  temperatura: 'temperature',
  temperature: 'temperature',
  humedad: 'humidity',
  humidity: 'humidity',
  viento: 'wind',
  wind: 'wind',
};

const METRIC_LABELS: Record<string, string> = {
  temperature: 'temperatura',
  humidity: 'humedad',
  wind: 'viento',
};

function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key)
    ? table[key]
    : undefined;
}

/**
 * "/clima Nueva York imperial detalle" → ciudad más opciones al final.
 */
export function parseClimaArgs(payload: string): ClimaArgs {
  const words = payload.trim().split(/\s+/).filter(Boolean);
  let units: UnitSystem = 'metric';
  let detailed = false;

  while (words.length > 1) {
    const last = words[words.length - 1].toLowerCase();
    const unitWord = lookup(UNIT_WORDS, last);
    if (unitWord) {
      units = unitWord;
    } else if (DETAIL_WORDS.includes(last)) {
      detailed = true;
    } else {
      break;
    }
    words.pop();
  }

  return { city: words.join(' '), units, detailed };
}

/**
 * "/comparar Madrid, Lima, Quito humedad" → ciudades separadas por comas,
 * con la métrica opcional como última palabra.
 */
export function parseCompararArgs(payload: string): CompararArgs {
  const parts = payload
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);

  let metric: ComparisonMetric | undefined;
  if (parts.length > 0) {
    const lastPart = parts[parts.length - 1];
    const words = lastPart.split(/\s+/);
    metric = lookup(METRIC_WORDS, words[words.length - 1].toLowerCase());
    if (metric) {
      const rest = words.slice(0, -1).join(' ');
      if (rest) {
        parts[parts.length - 1] = rest;
      } else {
        parts.pop();
      }
    }
  }

  return { cities: parts, metric };
}

export function buildWeatherMessage(result: WeatherResult): string {
  if (isWeatherFailure(result)) {
    return buildFailureMessage(result);
  }

  const lines = [
    `🌤 *${escapeMarkdownV2(result.city)}*`,
    `🌡 Temperatura: ${escapeMarkdownV2(result.temperature)}`,
    `☁️ Condición: ${escapeMarkdownV2(result.condition)}`,
    `💧 Humedad: ${escapeMarkdownV2(result.humidityPercent)}`,
    `💨 Viento: ${escapeMarkdownV2(result.wind)}`,
  ];

  if (result.forecast && result.forecast.length > 0) {
    lines.push('', '📅 *Pronóstico*');
    for (const day of result.forecast) {
      lines.push(
        escapeMarkdownV2(
          `${day.date}: ${day.condition}, ${day.maxTemp} / ${day.minTemp}`,
        ),
      );
    }
  }

  return lines.join('\n');
}

export function buildComparisonMessage(
  result: ComparisonResult | WeatherFailure,
): string {
  if (isWeatherFailure(result)) {
    return buildFailureMessage(result);
  }

  const label = lookup(METRIC_LABELS, result.metric) ?? result.metric;
  const header = `📊 *Comparación por ${escapeMarkdownV2(label)}*`;
  if (result.cities.length === 0) {
    return `${header}\n${escapeMarkdownV2(
      'No se pudo obtener el clima de ninguna ciudad.',
    )}`;
  }

  const rows = result.cities.map(
    (entry, index) =>
      `${index + 1}\\. *${escapeMarkdownV2(entry.city)}*: ${escapeMarkdownV2(
        `${entry.temperature}, 💧 ${entry.humidityPercent}, 💨 ${entry.wind}`,
      )}`,
  );
  return [header, ...rows].join('\n');
}

function buildFailureMessage(failure: WeatherFailure): string {
  return `⚠️ ${escapeMarkdownV2(failure.error)}`;
}
