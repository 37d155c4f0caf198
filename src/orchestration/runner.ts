/**
 * Runner — the scheduling trigger around the cycle pipeline
 *
 * - runOnce: one cycle under the database run lock, recorded in cycle_runs
 * - runForever: a cycle immediately, then one every polling interval,
 *   until SIGINT/SIGTERM
 *
 * Overlap is prevented twice: CyclePipeline refuses to start a cycle while
 * one is running in this process, and the run lock keeps a second process
 * on the same database out.
 */

import { randomUUID } from "crypto";
import type {
  CycleReport,
  CycleRunStatus,
  RunLockAcquireResult,
} from "@/types";
import {
  acquireRunLock,
  createCycleRun,
  finishCycleRun,
  releaseRunLock,
} from "@/db";
import {
  countChannelErrors,
  countProducerErrors,
  createEmptyReport,
} from "@/pipeline";
import { errorMessage } from "@/utils";
import type { AppContext } from "./context";

function recordCycle(
  runId: number,
  status: CycleRunStatus,
  report: CycleReport,
): void {
  finishCycleRun(runId, {
    finished_at: report.finishedAt,
    status,
    collected: report.collected,
    matched: report.matched,
    new_postings: report.newPostings,
    producer_errors: countProducerErrors(report),
    channel_errors: countChannelErrors(report),
    marked_notified: report.markedNotified,
  });
}

/**
 * Run exactly one cycle
 *
 * The database must already be open and migrated.
 *
 * @returns The cycle report; `skipped` when another run holds the lock or
 * a cycle is already running in this process
 * @throws Store errors from the cycle, after recording a failed cycle run;
 * run lock errors before any cycle run is recorded
 */
export async function runOnce(context: AppContext): Promise<CycleReport> {
  const { logger } = context;

  const ownerId = randomUUID();
  logger.debug("Acquiring global run lock", { ownerId });
  let lockResult: RunLockAcquireResult;
  try {
    lockResult = acquireRunLock(ownerId);
  } catch (error) {
    logger.error("Run lock unavailable", { error: errorMessage(error) });
    throw error;
  }

  if (!lockResult.ok) {
    logger.warn("Failed to acquire run lock - another run may be in progress", {
      reason: lockResult.reason,
    });
    const report = createEmptyReport("skipped", new Date().toISOString());
    const runId = createCycleRun(report.startedAt);
    finishCycleRun(runId, {
      finished_at: report.finishedAt,
      status: "skipped",
      notes: `run lock: ${lockResult.reason}`,
    });
    return report;
  }

  const runId = createCycleRun();

  try {
    const report = await context.pipeline.run();
    recordCycle(runId, report.status === "skipped" ? "skipped" : "success", report);

    logger.info("Cycle finished", {
      status: report.status,
      collected: report.collected,
      matched: report.matched,
      newPostings: report.newPostings,
      markedNotified: report.markedNotified,
      producerErrors: countProducerErrors(report),
      channelErrors: countChannelErrors(report),
    });

    return report;
  } catch (error) {
    logger.error("Cycle aborted", { error: errorMessage(error) });
    try {
      finishCycleRun(runId, {
        finished_at: new Date().toISOString(),
        status: "failure",
        notes: errorMessage(error),
      });
    } catch (recordError) {
      logger.error("Failed to record cycle failure", {
        error: errorMessage(recordError),
      });
    }
    throw error;
  } finally {
    try {
      if (releaseRunLock(ownerId)) {
        logger.debug("Global run lock released", { ownerId });
      } else {
        logger.warn("Failed to release run lock (may not be owned)", {
          ownerId,
        });
      }
    } catch (releaseError) {
      logger.error("Failed to release run lock", {
        ownerId,
        error: errorMessage(releaseError),
      });
    }
  }
}

export type RunForeverOptions = {
  /** Stop after this many cycles (tests) */
  maxCycles?: number;
  /** Overrides polling.intervalMinutes */
  intervalMs?: number;
};

/**
 * Resolve after `ms`, or as soon as `signal` aborts
 */
function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Run cycles until a shutdown signal arrives
 *
 * The first cycle starts immediately; later cycles start one interval
 * after the previous one started (or right away if it took longer).
 * A signal lets the running cycle finish and prevents the next one; a
 * second signal exits immediately. A failed cycle is logged and the loop
 * carries on at the next tick.
 *
 * @returns Number of cycles run
 */
export async function runForever(
  context: AppContext,
  options: RunForeverOptions = {},
): Promise<number> {
  const { logger } = context;
  const intervalMs =
    options.intervalMs ?? context.config.polling.intervalMinutes * 60_000;

  logger.info("Starting continuous runner (forever mode)", { intervalMs });

  const shutdown = new AbortController();

  const handleShutdown = (signal: NodeJS.Signals) => {
    if (shutdown.signal.aborted) {
      logger.warn("Forced shutdown - exiting immediately");
      process.exit(1);
    }
    logger.info("Shutdown signal received, will stop after current cycle", {
      signal,
    });
    shutdown.abort();
  };

  process.on("SIGINT", handleShutdown);
  process.on("SIGTERM", handleShutdown);

  let cycleCount = 0;

  try {
    while (!shutdown.signal.aborted) {
      cycleCount++;
      const cycleStartMs = Date.now();

      try {
        logger.info("Starting runner cycle", { cycleCount });
        await runOnce(context);
      } catch (error) {
        logger.error("Runner cycle failed with error", {
          cycleCount,
          error: errorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
      }

      if (options.maxCycles !== undefined && cycleCount >= options.maxCycles) {
        break;
      }

      if (shutdown.signal.aborted) {
        logger.info("Shutdown requested, exiting loop");
        break;
      }

      const sleepMs = Math.max(0, intervalMs - (Date.now() - cycleStartMs));
      logger.info("Cycle complete, sleeping before next iteration", {
        cycleCount,
        sleepMs,
      });
      await interruptibleSleep(sleepMs, shutdown.signal);
    }
  } finally {
    process.off("SIGINT", handleShutdown);
    process.off("SIGTERM", handleShutdown);
  }

  logger.info("Continuous runner stopped", { totalCycles: cycleCount });
  return cycleCount;
}
