export {
  createLogger,
  createSilentLogger,
  parseLogLevel,
  isLogLevel,
  formatLine,
  formatMeta,
} from "./logger";
