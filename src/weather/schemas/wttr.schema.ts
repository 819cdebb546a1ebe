import { z } from 'zod';

// wttr.in entrega los valores numéricos como cadenas ("12", "-3")
const numeric = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/, 'Expected a numeric value')
    .transform(Number),
]);

const descriptionList = z
  .array(z.object({ value: z.string() }))
  .min(1, 'Missing weather description');

export const CurrentConditionSchema = z.object({
  temp_C: numeric,
  temp_F: numeric,
  weatherDesc: descriptionList,
  humidity: numeric,
  windspeedKmph: numeric,
  windspeedMiles: numeric,
});

// Las entradas horarias se validan de forma laxa: un hueco faltante
// se detecta al extraer el pronóstico, no aquí.
export const HourlySchema = z.object({
  weatherDesc: z.array(z.object({ value: z.string() })).optional(),
});

export const ForecastDaySchema = z.object({
  date: z.string(),
  maxtempC: numeric,
  maxtempF: numeric.optional(),
  mintempC: numeric,
  mintempF: numeric.optional(),
  hourly: z.array(HourlySchema).default([]),
});

export const WttrResponseSchema = z.object({
  current_condition: z
    .array(CurrentConditionSchema)
    .min(1, 'Missing current conditions'),
  // Los días se validan sólo cuando se pide el pronóstico
  weather: z.array(z.unknown()).default([]),
});

export type WttrCurrentCondition = z.infer<typeof CurrentConditionSchema>;
export type WttrForecastDay = z.infer<typeof ForecastDaySchema>;
export type WttrResponse = z.infer<typeof WttrResponseSchema>;
