#!/usr/bin/env node
import cron from "node-cron";
import { type AppConfig, loadConfig } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import { createMonitorDeps, runMonitorOnce } from "./monitor.js";

async function runOnce(config: AppConfig): Promise<void> {
  const { report, delivery } = await runMonitorOnce(createMonitorDeps(config));
  console.log(
    `[WATCH] Run finished: ${report.changed} changed, ${report.failed} failed, ` +
      `${delivery.sent.length} email(s) sent, ${delivery.failed.length} not delivered`
  );
}

function schedule(config: AppConfig, expression: string): void {
  if (!cron.validate(expression)) {
    throw new ConfigError(`Invalid CRON_SCHEDULE: ${expression}`);
  }

  let running = false;
  const tick = async (): Promise<void> => {
    if (running) {
      console.warn("[WATCH] Previous run still in progress, skipping this tick.");
      return;
    }
    running = true;
    console.log(`[WATCH] Scheduled run started at ${new Date().toISOString()}`);
    try {
      await runOnce(config);
    } catch (err) {
      console.error(`[WATCH] Scheduled run error: ${describeError(err)}`);
    } finally {
      running = false;
    }
  };

  console.log(`[WATCH] Page monitor starting. Schedule: ${expression}`);
  cron.schedule(expression, () => {
    void tick();
  });
  // Run immediately at startup
  void tick();
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (config.CRON_SCHEDULE) {
    schedule(config, config.CRON_SCHEDULE);
    return;
  }
  await runOnce(config);
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(`[WATCH] Configuration error: ${err.message}`);
  } else {
    console.error("[WATCH] Fatal:", err);
  }
  process.exit(1);
});
