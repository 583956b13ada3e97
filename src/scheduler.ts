import cron from "node-cron";
import { createLogger } from "./logger.js";
import { describeFailure } from "./services/monitor.js";
import type { MonitoringCycle } from "./services/monitor.js";

const log = createLogger("scheduler");

export interface ScheduleSettings {
  checkIntervalCron: string;
  syncIntervalCron: string;
}

export interface SchedulerHandle {
  stop(): void;
}

type ScheduledMonitor = Pick<MonitoringCycle, "runCycle" | "syncWatchlist" | "notifyError">;

/**
 * Syncs history and runs one check right away, then keeps both on their cron
 * schedules. Overlapping checks are skipped by the monitor itself.
 */
export function startScheduler(
  monitor: ScheduledMonitor,
  settings: ScheduleSettings,
): SchedulerHandle {
  const runSafely = async (name: string, task: () => Promise<unknown>): Promise<void> => {
    try {
      await task();
    } catch (e) {
      log.error(`${name} failed: ${describeFailure(e)}`);
      await monitor.notifyError(`Scheduled ${name}`, e);
    }
  };

  log.info(`Check schedule: ${settings.checkIntervalCron}`);
  log.info(`Sync schedule:  ${settings.syncIntervalCron}`);

  void (async () => {
    await runSafely("initial sync", () => monitor.syncWatchlist());
    await runSafely("initial check", () => monitor.runCycle());
  })();

  const check = cron.schedule(settings.checkIntervalCron, () => {
    void runSafely("check", () => monitor.runCycle());
  });
  const sync = cron.schedule(settings.syncIntervalCron, () => {
    void runSafely("sync", () => monitor.syncWatchlist());
  });

  return {
    stop() {
      check.stop();
      sync.stop();
      log.info("Scheduler stopped");
    },
  };
}
