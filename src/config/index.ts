/**
 * Configuration public API
 */

export {
  loadConfig,
  parseConfig,
  resolveConfigPath,
} from "./loader";
export type { LoadConfigOptions } from "./loader";
export { expandEnvReferences, expandEnvString } from "./envExpansion";
export type { Env } from "./envExpansion";
export { ConfigValidationError } from "@/utils/configValidation";
