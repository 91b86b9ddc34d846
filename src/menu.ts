import { MENU, formatStatistics } from "./display.js";
import { StorageError, describeError } from "./errors.js";
import { runMonitor, type MonitorOptions, type MonitorResult } from "./monitor.js";
import { computeStatistics } from "./statistics.js";
import type { HistoryStore, Reading } from "./types.js";

export interface MenuIO {
  print(text: string): void;
  error(text: string): void;
  /** Resolves to `null` once input has ended. */
  ask(question: string): Promise<string | null>;
  /** Registers an interrupt listener and returns its disposer. */
  onInterrupt(listener: () => void): () => void;
}

export interface MenuOptions {
  defaultIntervalSeconds: number;
  monitor?: (options: MonitorOptions) => Promise<MonitorResult>;
}

export class WeatherMenu {
  constructor(
    private readonly store: HistoryStore,
    private readonly io: MenuIO,
    private readonly options: MenuOptions
  ) {}

  async run(): Promise<void> {
    for (;;) {
      this.io.print(MENU);
      const answer = await this.io.ask("\nEnter your choice (1-3): ");
      if (answer === null) {
        this.io.print("Exiting...");
        return;
      }

      const choice = answer.trim();
      if (choice === "1") {
        const result = await this.startMonitoring();
        if (result === null) {
          this.io.print("Exiting...");
          return;
        }
      } else if (choice === "2") {
        await this.showStatistics();
      } else if (choice === "3") {
        this.io.print("Exiting...");
        return;
      } else {
        this.io.error(`Invalid choice "${choice}". Please enter 1, 2 or 3.`);
      }
    }
  }

  /** Resolves to `null` when input ended before monitoring could start. */
  async startMonitoring(): Promise<MonitorResult | null> {
    const { defaultIntervalSeconds } = this.options;
    const answer = await this.io.ask(
      `Enter monitoring interval in seconds (default ${defaultIntervalSeconds}): `
    );
    if (answer === null) {
      return null;
    }

    const controller = new AbortController();
    const dispose = this.io.onInterrupt(() => controller.abort());
    const monitor = this.options.monitor ?? runMonitor;

    let result: MonitorResult;
    try {
      result = await monitor({
        interval: answer,
        defaultIntervalSeconds,
        signal: controller.signal,
        store: this.store,
        print: (text) => this.io.print(text),
        printError: (text) => this.io.error(text),
      });
    } finally {
      dispose();
    }

    if (result.stopReason === "interrupted") {
      this.io.print("\n\nMonitoring stopped by user.");
    }
    if (result.dropped > 0) {
      this.io.error(
        `${result.dropped} older reading(s) were discarded while saves kept failing.`
      );
    }
    if (result.unsaved.length > 0) {
      this.io.error(
        `${result.unsaved.length} reading(s) could not be saved to the history file.`
      );
    }
    return result;
  }

  async showStatistics(): Promise<void> {
    let history: Reading[];
    try {
      history = await this.store.load();
    } catch (error) {
      if (error instanceof StorageError) {
        this.io.error(`Unable to load statistics: ${describeError(error)}`);
        return;
      }
      throw error;
    }

    const stats = computeStatistics(history);
    this.io.print(stats ? formatStatistics(stats) : "No data available yet.");
  }
}
