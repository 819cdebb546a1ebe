import { formatPercent, formatUnit, parseLeadingNumber } from './unit-format';
import { UnitKind, UnitSystem } from '../interfaces/weather.interface';

describe('formatUnit', () => {
  it('formats temperatures per unit system', () => {
    expect(formatUnit(20, 'temperature', 'metric')).toBe('20°C');
    expect(formatUnit(20, 'temperature', 'imperial')).toBe('20°F');
  });

  it('formats wind speeds per unit system', () => {
    expect(formatUnit(15, 'wind', 'metric')).toBe('15 km/h');
    expect(formatUnit(9, 'wind', 'imperial')).toBe('9 mph');
  });

  it('does not round provider values', () => {
    expect(formatUnit(-3.75, 'temperature', 'metric')).toBe('-3.75°C');
  });

  it('falls back to metric for unknown selectors', () => {
    const kelvin = 'kelvin' as UnitSystem;
    const pressure = 'pressure' as UnitKind;
    expect(formatUnit(4, 'wind', kelvin)).toBe('4 km/h');
    expect(formatUnit(4, pressure, 'imperial')).toBe('4°F');
    expect(formatUnit(4, pressure, kelvin)).toBe('4°C');
  });
});

describe('formatPercent', () => {
  it('appends the percent sign', () => {
    expect(formatPercent(81)).toBe('81%');
  });
});

describe('parseLeadingNumber', () => {
  it.each([
    ['25°C', 25],
    ['-4°F', -4],
    ['12.5 km/h', 12.5],
    ['80%', 80],
    ['  7 mph', 7],
  ])('reads %s as %d', (text, expected) => {
    expect(parseLeadingNumber(text)).toBe(expected);
  });

  it('returns undefined without a leading number', () => {
    expect(parseLeadingNumber('n/a')).toBeUndefined();
    expect(parseLeadingNumber('')).toBeUndefined();
  });
});
