import type { MonitorConfig } from "./types.js";

export const DEFAULT_OUTPUT_DIR = ".";
export const DEFAULT_DATA_FILE = "weather_data.json";
export const DEFAULT_INTERVAL_SECONDS = 5;

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, name: string, fallback: string): string {
  const value = env[name];
  if (value && value.trim().length > 0) {
    return value.trim();
  }
  return fallback;
}

function getDefaultInterval(env: Env): number {
  const raw = env.DEFAULT_INTERVAL_SECONDS;
  if (!raw || raw.trim().length === 0) {
    return DEFAULT_INTERVAL_SECONDS;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_INTERVAL_SECONDS;
}

export function loadConfig(env: Env = process.env): MonitorConfig {
  return {
    outputDir: getEnvVar(env, "OUTPUT_DIR", DEFAULT_OUTPUT_DIR),
    dataFile: getEnvVar(env, "DATA_FILE", DEFAULT_DATA_FILE),
    defaultIntervalSeconds: getDefaultInterval(env),
  };
}
