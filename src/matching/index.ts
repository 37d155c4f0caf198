/**
 * Matching engine barrel exports
 */

export * from "./matcher";
export * from "./criteria";
export * from "./experienceLevels";
export * from "./similarity";
