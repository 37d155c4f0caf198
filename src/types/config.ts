/**
 * Application configuration type definitions
 */

import type { LogLevel } from "./logger";
import type { RawMatchCriteria } from "./matching";

/**
 * Greenhouse job board (boards-api.greenhouse.io)
 */
export type GreenhouseSourceConfig = {
  type: "greenhouse";
  name: string;
  boardToken: string;
  /** Display name; defaults to `name` */
  company?: string;
};

/**
 * Lever hosted postings (api.lever.co)
 */
export type LeverSourceConfig = {
  type: "lever";
  name: string;
  site: string;
  company?: string;
};

/**
 * Any careers page whose listings are plain anchors
 */
export type CareersPageSourceConfig = {
  type: "careers-page";
  name: string;
  url: string;
  company?: string;
  /** Regex source tested against each anchor href */
  linkPattern?: string;
};

/**
 * Closed set of producer variants, resolved once at startup
 */
export type SourceConfig =
  | GreenhouseSourceConfig
  | LeverSourceConfig
  | CareersPageSourceConfig;

export type TelegramChannelConfig = {
  enabled: boolean;
  botToken: string;
  chatId: string;
};

export type EmailChannelConfig = {
  enabled: boolean;
  smtpHost: string;
  smtpPort: number;
  /** Implicit TLS; false means STARTTLS when offered */
  secure: boolean;
  senderEmail: string;
  senderPassword: string;
  recipientEmail: string;
};

export type NotificationsConfig = {
  telegram: TelegramChannelConfig;
  email: EmailChannelConfig;
};

export type AppConfig = {
  polling: {
    intervalMinutes: number;
  };
  sources: SourceConfig[];
  /** Assembled from the `keywords`, `experienceLevels` and `matching` sections */
  criteria: RawMatchCriteria;
  notifications: NotificationsConfig;
  database: {
    path: string;
  };
  logging: {
    level: LogLevel;
    file?: string;
  };
  pipeline: {
    retryUnnotified: boolean;
  };
};
