import {
  CurrentConditions,
  ForecastDay,
  UnitSystem,
} from '../interfaces/weather.interface';
import {
  ForecastDaySchema,
  WttrCurrentCondition,
} from '../schemas/wttr.schema';
import { ProviderPayloadError } from '../errors/provider-payload.error';
import { formatPercent, formatUnit } from './unit-format';

export const FORECAST_DAYS = 3;
// Franja horaria del mediodía dentro del desglose de 3 en 3 horas
export const MIDDAY_SLOT = 4;

export function normalizeConditions(
  city: string,
  current: WttrCurrentCondition,
  unitSystem: UnitSystem,
): CurrentConditions {
  const imperial = unitSystem === 'imperial';
  return {
    city,
    temperature: formatUnit(
      imperial ? current.temp_F : current.temp_C,
      'temperature',
      unitSystem,
    ),
    condition: current.weatherDesc[0].value,
    humidityPercent: formatPercent(current.humidity),
    wind: formatUnit(
      imperial ? current.windspeedMiles : current.windspeedKmph,
      'wind',
      unitSystem,
    ),
  };
}

/**
 * Resume los primeros días del pronóstico en el orden del proveedor.
 *
 * Lanza {@link ProviderPayloadError} si un día no trae la franja del mediodía;
 * quien llama decide cómo reportarlo.
 */
export function extractForecast(
  days: unknown[],
  unitSystem: UnitSystem,
): ForecastDay[] {
  return days.slice(0, FORECAST_DAYS).map((raw, index) => {
    const parsed = ForecastDaySchema.safeParse(raw);
    if (!parsed.success) {
      throw ProviderPayloadError.fromZod(parsed.error);
    }
    const day = parsed.data;

    const condition = day.hourly[MIDDAY_SLOT]?.weatherDesc?.[0]?.value;
    if (condition === undefined) {
      throw new ProviderPayloadError(
        `Forecast day ${index} (${day.date}) has no hourly slot ${MIDDAY_SLOT}`,
      );
    }

    let maxTemp = day.maxtempC;
    let minTemp = day.mintempC;
    if (unitSystem === 'imperial') {
      if (day.maxtempF === undefined || day.mintempF === undefined) {
        throw new ProviderPayloadError(
          `Forecast day ${index} (${day.date}) has no Fahrenheit temperatures`,
        );
      }
      maxTemp = day.maxtempF;
      minTemp = day.mintempF;
    }

    return {
      date: day.date,
      maxTemp: formatUnit(maxTemp, 'temperature', unitSystem),
      minTemp: formatUnit(minTemp, 'temperature', unitSystem),
      condition,
    };
  });
}
