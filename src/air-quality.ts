import type { AirQualityStatus } from "./types.js";

const AQI_BANDS: ReadonlyArray<readonly [upperBound: number, status: AirQualityStatus]> = [
  [50, "Good"],
  [100, "Moderate"],
  [150, "Unhealthy for Sensitive Groups"],
  [200, "Unhealthy"],
  [300, "Very Unhealthy"],
];

/**
 * Maps an air quality index to its status band. Anything above 300 is
 * Hazardous; negative or non-finite values are rejected.
 */
export function classifyAirQuality(aqi: number): AirQualityStatus {
  if (!Number.isFinite(aqi) || aqi < 0) {
    throw new RangeError(`Air quality index must be a non-negative number, got ${aqi}`);
  }

  for (const [upperBound, status] of AQI_BANDS) {
    if (aqi <= upperBound) {
      return status;
    }
  }
  return "Hazardous";
}
