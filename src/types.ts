export type AirQualityStatus =
  | "Good"
  | "Moderate"
  | "Unhealthy for Sensitive Groups"
  | "Unhealthy"
  | "Very Unhealthy"
  | "Hazardous";

export interface Reading {
  timestamp: string;
  temperature_celsius: number;
  temperature_fahrenheit: number;
  humidity_percent: number;
  air_quality_index: number;
  air_quality_status: AirQualityStatus;
}

export interface MetricSummary {
  min: number;
  max: number;
  average: number;
}

export interface WeatherStatistics {
  count: number;
  temperature: MetricSummary;
  humidity: MetricSummary;
  airQuality: MetricSummary;
}

export interface HistoryStore {
  load(): Promise<Reading[]>;
  append(reading: Reading): Promise<void>;
  appendAll(readings: readonly Reading[]): Promise<Reading[]>;
}

export interface MonitorConfig {
  outputDir: string;
  dataFile: string;
  defaultIntervalSeconds: number;
}
