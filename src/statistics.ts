import type { MetricSummary, Reading, WeatherStatistics } from "./types.js";

function summarize(values: number[]): MetricSummary {
  let min = values[0];
  let max = values[0];
  let sum = 0;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
    sum += value;
  }
  return { min, max, average: sum / values.length };
}

/** Returns `null` when there is nothing to aggregate. */
export function computeStatistics(history: readonly Reading[]): WeatherStatistics | null {
  if (history.length === 0) {
    return null;
  }

  return {
    count: history.length,
    temperature: summarize(history.map((r) => r.temperature_celsius)),
    humidity: summarize(history.map((r) => r.humidity_percent)),
    airQuality: summarize(history.map((r) => r.air_quality_index)),
  };
}
