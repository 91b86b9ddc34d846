#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config.js";
import { ConsoleMenuIO } from "./console-io.js";
import { WeatherMenu } from "./menu.js";
import { ReadingStore } from "./reading-store.js";
import { buildDataFilePath, ensureOutputDir } from "./utils.js";

async function main(): Promise<void> {
  const config = loadConfig();
  await ensureOutputDir(config.outputDir);

  const store = new ReadingStore(buildDataFilePath(config.outputDir, config.dataFile));
  const io = new ConsoleMenuIO();
  try {
    await new WeatherMenu(store, io, {
      defaultIntervalSeconds: config.defaultIntervalSeconds,
    }).run();
  } finally {
    io.close();
  }
}

main().catch((error) => {
  console.error("Weather monitor failed", error);
  process.exitCode = 1;
});
