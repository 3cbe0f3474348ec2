export interface WeatherForecast {
  date: string;
  temperatureC: number;
  temperatureF: number;
  summary: string;
}

export const SUMMARIES = [
  'Freezing',
  'Bracing',
  'Chilly',
  'Cool',
  'Mild',
  'Warm',
  'Balmy',
  'Hot',
  'Sweltering',
  'Scorching',
] as const;

const MIN_TEMPERATURE_C = -20;
const MAX_TEMPERATURE_C = 55; // exclusive

export function toFahrenheit(temperatureC: number): number {
  return 32 + Math.trunc(temperatureC / 0.5556);
}

function formatDate(date: Date): string {
  const yyyy = date.getFullYear().toString().padStart(4, '0');
  const mm = (date.getMonth() + 1).toString().padStart(2, '0');
  const dd = date.getDate().toString().padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

/**
 * Sample forecast for the days following `today` (local calendar dates).
 * `random` must return values in [0, 1), like Math.random.
 */
export function generateForecast(
  days = 5,
  random: () => number = Math.random,
  today: Date = new Date()
): WeatherForecast[] {
  return Array.from({ length: days }, (_, i) => {
    const date = new Date(today.getFullYear(), today.getMonth(), today.getDate() + i + 1);
    const temperatureC =
      MIN_TEMPERATURE_C + Math.floor(random() * (MAX_TEMPERATURE_C - MIN_TEMPERATURE_C));
    const summary = SUMMARIES[Math.floor(random() * SUMMARIES.length)] ?? SUMMARIES[0];
    return {
      date: formatDate(date),
      temperatureC,
      temperatureF: toFahrenheit(temperatureC),
      summary,
    };
  });
}
