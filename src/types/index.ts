export * from "./logger";
export * from "./posting";
export * from "./matching";
export * from "./db";
export * from "./runLock";
export * from "./pipeline";
export * from "./config";
export * from "./producers";
export * from "./clients/http";
// Greenhouse and Lever payload types stay out of this barrel; only the
// producer that owns them imports them.
export * from "./runner";
