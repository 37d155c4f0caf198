export * from "./logger";
export * from "./textNormalization";
export * from "./experienceLevels";
export * from "./matching";
export * from "./runLock";
export * from "./runner";
export * from "./config";
export * from "./notifications";
export * from "./clients/http";
export * from "./clients/greenhouse";
export * from "./clients/lever";
export * from "./clients/careersPage";
