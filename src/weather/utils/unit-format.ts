import { UnitKind, UnitSystem } from '../interfaces/weather.interface';

const SUFFIXES: Record<UnitKind, Record<UnitSystem, string>> = {
  temperature: { metric: '°C', imperial: '°F' },
  wind: { metric: ' km/h', imperial: ' mph' },
};

/**
 * Formatea una lectura numérica con el sufijo de su unidad.
 * No redondea: el valor se muestra tal como lo entrega el proveedor.
 * Combinaciones desconocidas caen al formato métrico de temperatura.
 */
export function formatUnit(
  value: number,
  kind: UnitKind,
  unitSystem: UnitSystem,
): string {
  const byUnit = SUFFIXES[kind] ?? SUFFIXES.temperature;
  const suffix = byUnit[unitSystem] ?? byUnit.metric;
  return `${value}${suffix}`;
}

export function formatPercent(value: number): string {
  return `${value}%`;
}

/**
 * Extrae el primer número de un campo ya formateado ("25°C", "12 km/h", "80%").
 */
export function parseLeadingNumber(text: string): number | undefined {
  const match = text.trim().match(/^-?\d+(?:\.\d+)?/);
  return match ? Number(match[0]) : undefined;
}
