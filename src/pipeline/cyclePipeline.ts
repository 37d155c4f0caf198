/**
 * CyclePipeline — runCycle behind an execution-in-progress guard
 *
 * A call that arrives while a cycle is running does not start another one;
 * it resolves immediately with a `skipped` report.
 */

import type { CycleDeps, CycleReport } from "@/types";
import { runCycle } from "./runCycle";
import { createEmptyReport } from "./report";

export class CyclePipeline {
  private readonly deps: CycleDeps;
  private inFlight = false;

  constructor(deps: CycleDeps) {
    this.deps = deps;
  }

  async run(): Promise<CycleReport> {
    if (this.inFlight) {
      this.deps.logger.warn("Cycle already in progress, skipping");
      return createEmptyReport("skipped", new Date().toISOString());
    }

    this.inFlight = true;
    try {
      return await runCycle(this.deps);
    } finally {
      this.inFlight = false;
    }
  }
}
