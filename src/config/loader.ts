/**
 * Configuration loader
 *
 * Reads the JSON config file, expands ${VAR} references from the
 * environment and validates it into an AppConfig. Structural problems
 * throw ConfigValidationError. Value-level problems inside the matching
 * settings are left to compileCriteria, which degrades them with a warning.
 */

import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import type {
  AppConfig,
  CareersPageSourceConfig,
  EmailChannelConfig,
  GreenhouseSourceConfig,
  LeverSourceConfig,
  Logger,
  SourceConfig,
  TelegramChannelConfig,
} from "@/types";
import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_DB_PATH,
  DEFAULT_LOG_LEVEL,
  DEFAULT_POLLING_INTERVAL_MINUTES,
  DEFAULT_SMTP_HOST,
  DEFAULT_SMTP_PORT,
} from "@/constants";
import { parseLogLevel } from "@/logger";
import {
  ConfigValidationError,
  isRecord,
  readBoolean,
  readNumber,
  readOptionalString,
  readPositiveNumber,
  readSection,
  readStringArray,
  validateNonEmptyString,
} from "@/utils";
import { expandEnvReferences } from "./envExpansion";
import type { Env } from "./envExpansion";

export type LoadConfigOptions = {
  /** Config file; defaults to CONFIG_PATH, then config/config.json */
  path?: string;
  /** Defaults to process.env */
  env?: Env;
  /** Receives a warning for every unresolved ${VAR} reference */
  logger?: Logger;
};

/**
 * Resolve the config file path (relative paths against the working directory)
 */
export function resolveConfigPath(path?: string, env: Env = process.env): string {
  return resolve(process.cwd(), path || env.CONFIG_PATH || DEFAULT_CONFIG_PATH);
}

function parseSourceCommon(
  raw: Record<string, unknown>,
  fieldPath: string,
): { name: string; company?: string } {
  validateNonEmptyString(raw.name, `${fieldPath}.name`);
  const company = readOptionalString(raw.company, `${fieldPath}.company`);
  return {
    name: raw.name.trim(),
    ...(company && company.trim() ? { company: company.trim() } : {}),
  };
}

function parseSource(raw: unknown, index: number): SourceConfig {
  const fieldPath = `sources[${index}]`;
  if (!isRecord(raw)) {
    throw new ConfigValidationError(fieldPath, "must be an object");
  }

  const common = parseSourceCommon(raw, fieldPath);

  switch (raw.type) {
    case "greenhouse": {
      validateNonEmptyString(raw.boardToken, `${fieldPath}.boardToken`);
      const source: GreenhouseSourceConfig = {
        type: "greenhouse",
        ...common,
        boardToken: raw.boardToken.trim(),
      };
      return source;
    }
    case "lever": {
      validateNonEmptyString(raw.site, `${fieldPath}.site`);
      const source: LeverSourceConfig = {
        type: "lever",
        ...common,
        site: raw.site.trim(),
      };
      return source;
    }
    case "careers-page": {
      validateNonEmptyString(raw.url, `${fieldPath}.url`);
      if (!/^https?:\/\//i.test(raw.url.trim())) {
        throw new ConfigValidationError(
          `${fieldPath}.url`,
          "must be an http(s) URL",
        );
      }
      const linkPattern = readOptionalString(
        raw.linkPattern,
        `${fieldPath}.linkPattern`,
      );
      if (linkPattern !== undefined) {
        try {
          new RegExp(linkPattern, "i");
        } catch (err) {
          throw new ConfigValidationError(
            `${fieldPath}.linkPattern`,
            `is not a valid regular expression (${
              err instanceof Error ? err.message : String(err)
            })`,
          );
        }
      }
      const source: CareersPageSourceConfig = {
        type: "careers-page",
        ...common,
        url: raw.url.trim(),
        ...(linkPattern !== undefined ? { linkPattern } : {}),
      };
      return source;
    }
    default:
      throw new ConfigValidationError(
        `${fieldPath}.type`,
        `must be one of greenhouse, lever, careers-page, got ${JSON.stringify(raw.type)}`,
      );
  }
}

function parseSources(value: unknown): SourceConfig[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigValidationError("sources", "must be an array");
  }

  const sources = value.map(parseSource);

  const seen = new Set<string>();
  sources.forEach((source, index) => {
    if (seen.has(source.name)) {
      throw new ConfigValidationError(
        `sources[${index}].name`,
        `duplicates "${source.name}"`,
      );
    }
    seen.add(source.name);
  });

  return sources;
}

function parseTelegram(raw: Record<string, unknown>): TelegramChannelConfig {
  const fieldPath = "notifications.telegram";
  return {
    enabled: readBoolean(raw.enabled, `${fieldPath}.enabled`, false),
    botToken: readOptionalString(raw.botToken, `${fieldPath}.botToken`) ?? "",
    // Telegram chat ids are often written as numbers
    chatId:
      typeof raw.chatId === "number"
        ? String(raw.chatId)
        : (readOptionalString(raw.chatId, `${fieldPath}.chatId`) ?? ""),
  };
}

function parseEmail(raw: Record<string, unknown>): EmailChannelConfig {
  const fieldPath = "notifications.email";
  const smtpPort = readPositiveNumber(
    raw.smtpPort,
    `${fieldPath}.smtpPort`,
    DEFAULT_SMTP_PORT,
  );

  return {
    enabled: readBoolean(raw.enabled, `${fieldPath}.enabled`, false),
    smtpHost:
      readOptionalString(raw.smtpHost, `${fieldPath}.smtpHost`) ||
      DEFAULT_SMTP_HOST,
    smtpPort,
    // Port 465 is implicit TLS, anything else upgrades with STARTTLS
    secure: readBoolean(raw.secure, `${fieldPath}.secure`, smtpPort === 465),
    senderEmail:
      readOptionalString(raw.senderEmail, `${fieldPath}.senderEmail`) ?? "",
    senderPassword:
      readOptionalString(raw.senderPassword, `${fieldPath}.senderPassword`) ??
      "",
    recipientEmail:
      readOptionalString(raw.recipientEmail, `${fieldPath}.recipientEmail`) ??
      "",
  };
}

/**
 * Validate an already parsed (and env-expanded) config object
 */
export function parseConfig(raw: unknown, env: Env = process.env): AppConfig {
  if (!isRecord(raw)) {
    throw new ConfigValidationError("(root)", "must be a JSON object");
  }

  const polling = readSection(raw, "polling", "polling");
  const keywords = readSection(raw, "keywords", "keywords");
  const matching = readSection(raw, "matching", "matching");
  const notifications = readSection(raw, "notifications", "notifications");
  const database = readSection(raw, "database", "database");
  const logging = readSection(raw, "logging", "logging");
  const pipeline = readSection(raw, "pipeline", "pipeline");

  const rawLevel = readOptionalString(logging.level, "logging.level");
  const level = rawLevel
    ? parseLogLevel(rawLevel)
    : (parseLogLevel(env.LOG_LEVEL) ?? DEFAULT_LOG_LEVEL);
  if (level === null) {
    throw new ConfigValidationError(
      "logging.level",
      `must be one of debug, info, warn, error, got "${rawLevel}"`,
    );
  }

  const logFile = readOptionalString(logging.file, "logging.file");

  return {
    polling: {
      intervalMinutes: readPositiveNumber(
        polling.intervalMinutes,
        "polling.intervalMinutes",
        DEFAULT_POLLING_INTERVAL_MINUTES,
      ),
    },
    sources: parseSources(raw.sources),
    criteria: {
      include: readStringArray(keywords.include, "keywords.include"),
      exclude: readStringArray(keywords.exclude, "keywords.exclude"),
      locations: readStringArray(keywords.locations, "keywords.locations"),
      experienceLevels: readStringArray(
        raw.experienceLevels,
        "experienceLevels",
      ),
      mode: readOptionalString(matching.mode, "matching.mode"),
      fuzzyThreshold:
        matching.fuzzyThreshold === undefined
          ? undefined
          : readNumber(matching.fuzzyThreshold, "matching.fuzzyThreshold", 0),
      caseSensitive: readBoolean(
        matching.caseSensitive,
        "matching.caseSensitive",
        false,
      ),
    },
    notifications: {
      telegram: parseTelegram(
        readSection(notifications, "telegram", "notifications.telegram"),
      ),
      email: parseEmail(
        readSection(notifications, "email", "notifications.email"),
      ),
    },
    database: {
      path:
        env.DB_PATH ||
        readOptionalString(database.path, "database.path") ||
        DEFAULT_DB_PATH,
    },
    logging: {
      level,
      ...(logFile ? { file: logFile } : {}),
    },
    pipeline: {
      retryUnnotified: readBoolean(
        pipeline.retryUnnotified,
        "pipeline.retryUnnotified",
        false,
      ),
    },
  };
}

/**
 * Load, expand and validate the config file
 *
 * @throws {ConfigValidationError} Missing file, invalid JSON or wrong shape
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const path = resolveConfigPath(options.path, env);

  if (!existsSync(path)) {
    throw new ConfigValidationError(path, "does not exist");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigValidationError(
      path,
      `is not valid JSON (${err instanceof Error ? err.message : String(err)})`,
    );
  }

  const unresolved = new Set<string>();
  const expanded = expandEnvReferences(parsed, env, unresolved);
  for (const name of unresolved) {
    options.logger?.warn("Config references unset environment variable", {
      variable: name,
    });
  }

  return parseConfig(expanded, env);
}
