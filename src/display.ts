import type { Reading, WeatherStatistics } from "./types.js";

const RULE = "=".repeat(50);

const TITLE = "Weather Monitoring System";

export const MENU = [
  "",
  TITLE,
  "1. Start Monitoring",
  "2. View Statistics",
  "3. Exit",
].join("\n");

export function formatReading(reading: Reading): string {
  return [
    "",
    RULE,
    `Weather Monitor - ${reading.timestamp}`,
    RULE,
    `Temperature: ${reading.temperature_celsius.toFixed(2)}°C (${reading.temperature_fahrenheit.toFixed(2)}°F)`,
    `Humidity: ${reading.humidity_percent.toFixed(2)}%`,
    `Air Quality Index: ${reading.air_quality_index}`,
    `Air Quality Status: ${reading.air_quality_status}`,
    RULE,
  ].join("\n");
}

export function formatMonitorBanner(intervalSeconds: number): string {
  return [
    "",
    "Starting Weather Monitoring System...",
    `Reading sensors every ${intervalSeconds} seconds`,
    "Press Ctrl+C to stop",
  ].join("\n");
}

export function formatStatistics(stats: WeatherStatistics): string {
  const { temperature, humidity, airQuality } = stats;
  return [
    "",
    RULE,
    "Weather Statistics",
    RULE,
    `Total Readings: ${stats.count}`,
    "",
    "Temperature:",
    `  Average: ${temperature.average.toFixed(2)}°C`,
    `  Min: ${temperature.min.toFixed(2)}°C`,
    `  Max: ${temperature.max.toFixed(2)}°C`,
    "",
    "Humidity:",
    `  Average: ${humidity.average.toFixed(2)}%`,
    `  Min: ${humidity.min.toFixed(2)}%`,
    `  Max: ${humidity.max.toFixed(2)}%`,
    "",
    "Air Quality Index:",
    `  Average: ${airQuality.average.toFixed(0)}`,
    `  Min: ${airQuality.min}`,
    `  Max: ${airQuality.max}`,
    RULE,
  ].join("\n");
}
