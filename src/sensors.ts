import { classifyAirQuality } from "./air-quality.js";
import type { Reading } from "./types.js";
import { localIsoTimestamp, roundTo } from "./utils.js";

export const TEMPERATURE_BASELINE_C = 22.0;
export const TEMPERATURE_SPREAD_C = 10.0;
export const HUMIDITY_RANGE = { min: 30.0, max: 80.0 } as const;
export const AQI_RANGE = { min: 0, max: 200 } as const;

export type RandomSource = () => number;

function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

function uniformInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function celsiusToFahrenheit(celsius: number): number {
  return roundTo((celsius * 9) / 5 + 32);
}

// Stand-ins for the DHT22 (temperature, humidity) and MQ-135 (air quality) sensors.
export function generateReading(
  random: RandomSource = Math.random,
  now: Date = new Date()
): Reading {
  const temperatureC = roundTo(
    uniform(
      random,
      TEMPERATURE_BASELINE_C - TEMPERATURE_SPREAD_C,
      TEMPERATURE_BASELINE_C + TEMPERATURE_SPREAD_C
    )
  );
  const humidity = roundTo(uniform(random, HUMIDITY_RANGE.min, HUMIDITY_RANGE.max));
  const aqi = uniformInt(random, AQI_RANGE.min, AQI_RANGE.max);

  return {
    timestamp: localIsoTimestamp(now),
    temperature_celsius: temperatureC,
    temperature_fahrenheit: celsiusToFahrenheit(temperatureC),
    humidity_percent: humidity,
    air_quality_index: aqi,
    air_quality_status: classifyAirQuality(aqi),
  };
}
