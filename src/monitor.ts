import { DEFAULT_INTERVAL_SECONDS } from "./config.js";
import { formatMonitorBanner, formatReading } from "./display.js";
import { HistoryCorruptError, describeError } from "./errors.js";
import { HISTORY_LIMIT, trimHistory } from "./reading-store.js";
import { generateReading } from "./sensors.js";
import type { HistoryStore, Reading } from "./types.js";
import { sleep } from "./utils.js";

export type StopReason = "interrupted" | "storage-corrupt";

export interface MonitorOptions {
  interval: number | string | undefined;
  signal: AbortSignal;
  store: HistoryStore;
  print: (text: string) => void;
  printError: (text: string) => void;
  defaultIntervalSeconds?: number;
  generate?: () => Reading;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  historyLimit?: number;
}

export interface MonitorResult {
  intervalSeconds: number;
  cycles: number;
  /** Readings that were displayed but never reached the history file. */
  unsaved: Reading[];
  /** Unsaved readings evicted because they fell outside the history limit. */
  dropped: number;
  stopReason: StopReason;
}

function toSeconds(interval: number | string | undefined): number {
  if (typeof interval === "number") {
    return interval;
  }
  if (interval === undefined || interval.trim().length === 0) {
    return Number.NaN;
  }
  return Number(interval);
}

/** Blank, non-numeric and non-positive intervals fall back to the default. */
export function resolveIntervalSeconds(
  interval: number | string | undefined,
  fallback: number = DEFAULT_INTERVAL_SECONDS
): number {
  const seconds = toSeconds(interval);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : fallback;
}

export async function runMonitor(options: MonitorOptions): Promise<MonitorResult> {
  const { signal, store, print, printError } = options;
  const generate = options.generate ?? (() => generateReading());
  const wait = options.sleep ?? sleep;
  const historyLimit = options.historyLimit ?? HISTORY_LIMIT;
  const intervalSeconds = resolveIntervalSeconds(
    options.interval,
    options.defaultIntervalSeconds
  );

  print(formatMonitorBanner(intervalSeconds));

  // Readings whose save failed; flushed ahead of the next one.
  let pending: Reading[] = [];
  let cycles = 0;
  let dropped = 0;

  while (!signal.aborted) {
    const reading = generate();
    const queued = [...pending, reading];
    pending = trimHistory(queued, historyLimit);
    dropped += queued.length - pending.length;
    cycles += 1;

    let saved = true;
    let saveError: unknown;
    try {
      await store.appendAll(pending);
      pending = [];
    } catch (error) {
      saved = false;
      saveError = error;
    }

    print(formatReading(reading));

    if (saveError instanceof HistoryCorruptError) {
      printError(`${saveError.message}. Monitoring stopped; the file was left untouched.`);
      return {
        intervalSeconds,
        cycles,
        unsaved: pending,
        dropped,
        stopReason: "storage-corrupt",
      };
    }
    if (!saved) {
      printError(`Error saving data: ${describeError(saveError)}`);
    }

    if (signal.aborted) {
      break;
    }
    await wait(intervalSeconds * 1000, signal);
  }

  return { intervalSeconds, cycles, unsaved: pending, dropped, stopReason: "interrupted" };
}
