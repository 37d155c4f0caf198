/**
 * Producer type definitions
 */

import type { Logger } from "./logger";
import type { HttpRequestFn } from "./clients/http";

/**
 * Collaborators shared by every producer variant
 */
export type ProducerDeps = {
  logger: Logger;
  /** Defaults to the shared HTTP client bound to `logger` */
  httpRequest?: HttpRequestFn;
};
