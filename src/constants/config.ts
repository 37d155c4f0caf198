/**
 * Configuration constants
 */

/**
 * Configuration file, relative to the working directory.
 * Overridden by the CONFIG_PATH environment variable.
 */
export const DEFAULT_CONFIG_PATH = "config/config.json";

export const DEFAULT_DB_PATH = "data/jobs.db";

export const DEFAULT_SMTP_HOST = "smtp.gmail.com";

export const DEFAULT_SMTP_PORT = 587;

/**
 * ${VAR_NAME} references expanded from the environment
 */
export const ENV_REFERENCE_PATTERN = /\$\{([^}]+)\}/g;
