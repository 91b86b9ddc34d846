import { createInterface, type Interface } from "node:readline/promises";
import type { MenuIO } from "./menu.js";

/**
 * Terminal-backed menu I/O. Ctrl+C reaches readline as a "SIGINT" event
 * while stdin is a TTY and the process as a signal otherwise; both are
 * routed to the active interrupt listener, or end input when there is none.
 */
export class ConsoleMenuIO implements MenuIO {
  private readonly rl: Interface;
  private interruptListener: (() => void) | null = null;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on("close", () => {
      this.closed = true;
    });
    this.rl.on("SIGINT", () => this.interrupt());
  }

  print(text: string): void {
    console.log(text);
  }

  error(text: string): void {
    console.error(text);
  }

  async ask(question: string): Promise<string | null> {
    if (this.closed) {
      return null;
    }

    const controller = new AbortController();
    const onClose = () => controller.abort();
    this.rl.once("close", onClose);
    try {
      return await this.rl.question(question, { signal: controller.signal });
    } catch (error) {
      if (this.closed) {
        return null;
      }
      throw error;
    } finally {
      this.rl.off("close", onClose);
    }
  }

  onInterrupt(listener: () => void): () => void {
    const onSignal = () => this.interrupt();
    this.interruptListener = listener;
    process.on("SIGINT", onSignal);
    return () => {
      process.off("SIGINT", onSignal);
      if (this.interruptListener === listener) {
        this.interruptListener = null;
      }
    };
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private interrupt(): void {
    if (this.interruptListener) {
      this.interruptListener();
    } else {
      this.rl.close();
    }
  }
}
