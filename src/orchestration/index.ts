/**
 * Orchestration barrel exports
 */

export { createAppContext } from "./context";
export type { AppContext, AppContextOverrides } from "./context";
export { runOnce, runForever } from "./runner";
export type { RunForeverOptions } from "./runner";
export { testScrape, testNotify, SAMPLE_POSTING } from "./diagnostics";
export type {
  NotifyDiagnostic,
  PrintFn,
  ScrapeDiagnostic,
} from "./diagnostics";
