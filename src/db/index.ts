/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./postingStore";
export * from "./repos/postingsRepo";
export * from "./repos/runLockRepo";
export * from "./repos/cycleRunsRepo";
