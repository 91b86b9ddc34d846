import { formatMonitorBanner, formatReading } from "../../src/display.js";
import { HistoryCorruptError, StorageError } from "../../src/errors.js";
import { resolveIntervalSeconds, runMonitor } from "../../src/monitor.js";
import type { HistoryStore, Reading } from "../../src/types.js";

function makeReading(i: number): Reading {
  return {
    timestamp: `2025-06-01T08:00:0${i}.000`,
    temperature_celsius: 20 + i,
    temperature_fahrenheit: 68 + i * 1.8,
    humidity_percent: 50,
    air_quality_index: 10,
    air_quality_status: "Good",
  };
}

describe("resolveIntervalSeconds (unit)", () => {
  it.each([
    [0, 5],
    ["abc", 5],
    ["", 5],
    [undefined, 5],
    [-3, 5],
    [Number.POSITIVE_INFINITY, 5],
    ["2.5", 2.5],
    [" 7 ", 7],
    [10, 10],
  ])("resolves %p to %p", (input, expected) => {
    expect(resolveIntervalSeconds(input)).toBe(expected);
  });

  it("uses the supplied fallback", () => {
    expect(resolveIntervalSeconds("x", 8)).toBe(8);
  });
});

describe("runMonitor with the real timer (unit)", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - an interval beyond the 32-bit timer range still suspends the loop
   */
  it("waits out an interval longer than a single timer allows", async () => {
    const controller = new AbortController();
    const store: jest.Mocked<HistoryStore> = {
      load: jest.fn(),
      append: jest.fn(),
      appendAll: jest.fn().mockResolvedValue([]),
    };

    const running = runMonitor({
      interval: "3000000",
      signal: controller.signal,
      store,
      print: jest.fn(),
      printError: jest.fn(),
      generate: () => makeReading(1),
    });
    await jest.advanceTimersByTimeAsync(1000);

    expect(store.appendAll).toHaveBeenCalledTimes(1);

    controller.abort();
    const result = await running;

    expect(result.cycles).toBe(1);
    expect(result.intervalSeconds).toBe(3_000_000);
  });
});

describe("runMonitor (unit)", () => {
  let controller: AbortController;
  let store: jest.Mocked<HistoryStore>;
  let print: jest.Mock;
  let printError: jest.Mock;
  let generate: jest.Mock<Reading, []>;
  let sleep: jest.Mock<Promise<void>, [number, AbortSignal]>;

  /** Sleep stand-in that aborts the run after `cycles` waits. */
  function stopAfter(cycles: number) {
    sleep.mockImplementation(async () => {
      if (sleep.mock.calls.length >= cycles) {
        controller.abort();
      }
    });
  }

  beforeEach(() => {
    controller = new AbortController();
    store = {
      load: jest.fn(),
      append: jest.fn(),
      appendAll: jest.fn().mockResolvedValue([]),
    };
    print = jest.fn();
    printError = jest.fn();
    let count = 0;
    generate = jest.fn(() => makeReading(++count));
    sleep = jest.fn();
  });

  function run(interval: number | string | undefined) {
    return runMonitor({
      interval,
      signal: controller.signal,
      store,
      print,
      printError,
      generate,
      sleep,
    });
  }

  /**
   * Purpose:
   * Verifies Core behavior:
   * - invalid interval falls back to 5 seconds
   * - each cycle saves then displays its reading
   * - interrupt ends the loop cleanly
   */
  it("falls back to 5 seconds for a non-numeric interval", async () => {
    stopAfter(2);

    const result = await run("abc");

    expect(result).toEqual({
      intervalSeconds: 5,
      cycles: 2,
      unsaved: [],
      dropped: 0,
      stopReason: "interrupted",
    });
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenNthCalledWith(1, 5000, controller.signal);
    expect(store.appendAll).toHaveBeenNthCalledWith(1, [makeReading(1)]);
    expect(store.appendAll).toHaveBeenNthCalledWith(2, [makeReading(2)]);
    expect(print.mock.calls).toEqual([
      [formatMonitorBanner(5)],
      [formatReading(makeReading(1))],
      [formatReading(makeReading(2))],
    ]);
    expect(printError).not.toHaveBeenCalled();
  });

  it("falls back to 5 seconds for a zero interval", async () => {
    stopAfter(1);

    const result = await run(0);

    expect(result.intervalSeconds).toBe(5);
    expect(sleep).toHaveBeenCalledWith(5000, controller.signal);
  });

  it("sleeps for the requested interval", async () => {
    stopAfter(1);

    await run("2");

    expect(sleep).toHaveBeenCalledWith(2000, controller.signal);
  });

  it("does nothing when already interrupted", async () => {
    controller.abort();

    const result = await run(5);

    expect(result.cycles).toBe(0);
    expect(generate).not.toHaveBeenCalled();
    expect(print).toHaveBeenCalledTimes(1);
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - failed save is reported
   * - the reading is retried with the next cycle
   */
  it("retries a reading whose save failed", async () => {
    store.appendAll
      .mockRejectedValueOnce(new StorageError("disk full", "weather_data.json"))
      .mockResolvedValue([]);
    stopAfter(2);

    const result = await run(1);

    expect(printError).toHaveBeenCalledWith("Error saving data: disk full");
    expect(store.appendAll).toHaveBeenNthCalledWith(1, [makeReading(1)]);
    expect(store.appendAll).toHaveBeenNthCalledWith(2, [makeReading(1), makeReading(2)]);
    expect(result.unsaved).toEqual([]);
  });

  it("reports readings still unsaved when interrupted", async () => {
    store.appendAll.mockRejectedValue(new StorageError("read-only", "weather_data.json"));
    stopAfter(2);

    const result = await run(1);

    expect(result.unsaved).toEqual([makeReading(1), makeReading(2)]);
    expect(printError).toHaveBeenCalledTimes(2);
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - readings queued behind failing saves never exceed the history limit
   * - evicted readings are counted
   */
  it("bounds the readings queued while saves keep failing", async () => {
    store.appendAll.mockRejectedValue(new StorageError("read-only", "weather_data.json"));
    stopAfter(105);

    const result = await run(1);

    expect(result.cycles).toBe(105);
    expect(result.dropped).toBe(5);
    expect(result.unsaved).toHaveLength(100);
    expect(result.unsaved[0]).toEqual(makeReading(6));
    expect(result.unsaved[99]).toEqual(makeReading(105));
    for (const [queued] of store.appendAll.mock.calls) {
      expect(queued.length).toBeLessThanOrEqual(100);
    }
  });

  it("stops on a corrupt history file", async () => {
    store.appendAll.mockRejectedValue(
      new HistoryCorruptError("weather_data.json", "not valid JSON")
    );

    const result = await run(1);

    expect(result).toEqual({
      intervalSeconds: 1,
      cycles: 1,
      unsaved: [makeReading(1)],
      dropped: 0,
      stopReason: "storage-corrupt",
    });
    expect(printError).toHaveBeenCalledWith(
      "History file weather_data.json is corrupt: not valid JSON. Monitoring stopped; the file was left untouched."
    );
    expect(print).toHaveBeenLastCalledWith(formatReading(makeReading(1)));
    expect(sleep).not.toHaveBeenCalled();
  });
});
