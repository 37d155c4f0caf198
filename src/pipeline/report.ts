/**
 * Cycle report helpers
 */

import type { CycleReport, CycleStatus } from "@/types";

export function createEmptyReport(
  status: CycleStatus,
  startedAt: string,
  finishedAt: string = startedAt,
): CycleReport {
  return {
    status,
    startedAt,
    finishedAt,
    collected: 0,
    matched: 0,
    newPostings: 0,
    toDeliver: 0,
    markedNotified: 0,
    producers: [],
    channels: [],
  };
}

export function countProducerErrors(report: CycleReport): number {
  return report.producers.filter((outcome) => outcome.status === "error")
    .length;
}

/**
 * Channels that threw or delivered nothing
 */
export function countChannelErrors(report: CycleReport): number {
  return report.channels.filter(
    (outcome) => outcome.status === "error" || outcome.status === "failed",
  ).length;
}
