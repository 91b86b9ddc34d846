import fs from "node:fs/promises";
import path from "node:path";

export async function ensureOutputDir(outputDir: string): Promise<void> {
  await fs.mkdir(outputDir, { recursive: true });
}

export function buildDataFilePath(outputDir: string, dataFile: string): string {
  return path.join(outputDir, dataFile);
}

export function roundTo(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, "0");
}

/** Local wall-clock time as ISO-8601 without a zone suffix. */
export function localIsoTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day}T${time}.${pad(date.getMilliseconds(), 3)}`;
}

// fs errors can come from another realm (e.g. under Jest), so match on shape.
export function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/** Largest delay a Node timer accepts before clamping it to 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Waits `ms` milliseconds, in timer-sized chunks for long delays. Resolves
 * early, without rejecting, once `signal` is aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    let remaining = ms;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const finish = () => {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", finish);
      resolve();
    };
    const schedule = () => {
      if (!(remaining > 0)) {
        finish();
        return;
      }
      const chunk = Math.min(remaining, MAX_TIMER_MS);
      remaining -= chunk;
      timeoutId = setTimeout(schedule, chunk);
    };

    signal?.addEventListener("abort", finish, { once: true });
    schedule();
  });
}
