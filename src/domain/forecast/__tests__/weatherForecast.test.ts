import { describe, it, expect } from 'vitest';
import { SUMMARIES, generateForecast, toFahrenheit } from '../weatherForecast.js';

describe('weather forecast', () => {
  it('converts Celsius by truncating C / 0.5556', () => {
    expect(toFahrenheit(0)).toBe(32);
    expect(toFahrenheit(25)).toBe(76);
    expect(toFahrenheit(-20)).toBe(-3);
  });

  it('returns five consecutive days starting tomorrow', () => {
    const forecast = generateForecast(5, () => 0, new Date(2024, 1, 27));
    expect(forecast.map((f) => f.date)).toEqual([
      '2024-02-28',
      '2024-02-29',
      '2024-03-01',
      '2024-03-02',
      '2024-03-03',
    ]);
  });

  it('maps the lowest random draw to the coldest temperature and first summary', () => {
    const [first] = generateForecast(1, () => 0, new Date(2024, 0, 1));
    expect(first).toEqual({
      date: '2024-01-02',
      temperatureC: -20,
      temperatureF: -3,
      summary: 'Freezing',
    });
  });

  it('keeps temperatures below 55 and summaries within the fixed list', () => {
    const [hot] = generateForecast(1, () => 0.9999, new Date(2024, 0, 1));
    expect(hot.temperatureC).toBe(54);
    expect(hot.summary).toBe('Scorching');

    for (const entry of generateForecast(20)) {
      expect(entry.temperatureC).toBeGreaterThanOrEqual(-20);
      expect(entry.temperatureC).toBeLessThan(55);
      expect(SUMMARIES).toContain(entry.summary);
      expect(entry.temperatureF).toBe(toFahrenheit(entry.temperatureC));
    }
  });
});
