/**
 * Unit tests for the config loader
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { loadConfig, parseConfig } from "@/config/loader";
import { ConfigValidationError } from "@/utils/configValidation";
import { createCapturingLogger } from "../../helpers/fakes";

describe("parseConfig", () => {
  it("applies defaults to an empty object", () => {
    expect(parseConfig({}, {})).toEqual({
      polling: { intervalMinutes: 10 },
      sources: [],
      criteria: {
        include: [],
        exclude: [],
        locations: [],
        experienceLevels: [],
        caseSensitive: false,
      },
      notifications: {
        telegram: { enabled: false, botToken: "", chatId: "" },
        email: {
          enabled: false,
          smtpHost: "smtp.gmail.com",
          smtpPort: 587,
          secure: false,
          senderEmail: "",
          senderPassword: "",
          recipientEmail: "",
        },
      },
      database: { path: "data/jobs.db" },
      logging: { level: "info" },
      pipeline: { retryUnnotified: false },
    });
  });

  it("rejects a non-object root", () => {
    expect(() => parseConfig([], {})).toThrow(
      "Config validation failed: (root) must be a JSON object",
    );
  });

  it("assembles criteria from keywords, experienceLevels and matching", () => {
    const config = parseConfig(
      {
        keywords: {
          include: ["engineer"],
          exclude: ["intern"],
          locations: ["remote"],
        },
        experienceLevels: ["senior"],
        matching: { mode: "fuzzy", fuzzyThreshold: "0.9", caseSensitive: true },
      },
      {},
    );

    expect(config.criteria).toEqual({
      include: ["engineer"],
      exclude: ["intern"],
      locations: ["remote"],
      experienceLevels: ["senior"],
      mode: "fuzzy",
      fuzzyThreshold: 0.9,
      caseSensitive: true,
    });
  });

  it("reports the path of a bad keyword", () => {
    expect(() =>
      parseConfig({ keywords: { include: ["engineer", 3] } }, {}),
    ).toThrow("Config validation failed: keywords.include[1] must be a string, got number");
    expect(() => parseConfig({ keywords: { include: "engineer" } }, {})).toThrow(
      "Config validation failed: keywords.include must be an array, got string",
    );
  });

  it("parses every source type", () => {
    const config = parseConfig(
      {
        sources: [
          { type: "greenhouse", name: " acme ", company: " Acme ", boardToken: "acme" },
          { type: "lever", name: "globex", site: "globex" },
          {
            type: "careers-page",
            name: "initech",
            url: "https://careers.initech.example",
            linkPattern: "/jobs/\\d+",
          },
        ],
      },
      {},
    );

    expect(config.sources).toEqual([
      { type: "greenhouse", name: "acme", company: "Acme", boardToken: "acme" },
      { type: "lever", name: "globex", site: "globex" },
      {
        type: "careers-page",
        name: "initech",
        url: "https://careers.initech.example",
        linkPattern: "/jobs/\\d+",
      },
    ]);
  });

  it("rejects an unknown source type", () => {
    expect(() =>
      parseConfig({ sources: [{ type: "workday", name: "x" }] }, {}),
    ).toThrow(
      'Config validation failed: sources[0].type must be one of greenhouse, lever, careers-page, got "workday"',
    );
  });

  it("rejects a source without its required field", () => {
    expect(() =>
      parseConfig({ sources: [{ type: "lever", name: "globex" }] }, {}),
    ).toThrow("Config validation failed: sources[0].site must be a string, got undefined");
  });

  it("rejects duplicate source names", () => {
    expect(() =>
      parseConfig(
        {
          sources: [
            { type: "lever", name: "acme", site: "acme" },
            { type: "greenhouse", name: "acme", boardToken: "acme" },
          ],
        },
        {},
      ),
    ).toThrow('Config validation failed: sources[1].name duplicates "acme"');
  });

  it("validates careers page urls and link patterns", () => {
    expect(() =>
      parseConfig(
        { sources: [{ type: "careers-page", name: "x", url: "ftp://x" }] },
        {},
      ),
    ).toThrow("Config validation failed: sources[0].url must be an http(s) URL");

    let caught: unknown;
    try {
      parseConfig(
        {
          sources: [
            {
              type: "careers-page",
              name: "x",
              url: "https://x.example",
              linkPattern: "(",
            },
          ],
        },
        {},
      );
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigValidationError);
    expect(caught).toMatchObject({ fieldPath: "sources[0].linkPattern" });
  });

  it("accepts a numeric Telegram chat id", () => {
    const config = parseConfig(
      { notifications: { telegram: { enabled: true, chatId: -100123 } } },
      {},
    );

    expect(config.notifications.telegram.chatId).toBe("-100123");
  });

  it("derives implicit TLS from the SMTP port", () => {
    const implicit = parseConfig(
      { notifications: { email: { smtpPort: 465 } } },
      {},
    );
    const starttls = parseConfig(
      { notifications: { email: { smtpPort: "2525" } } },
      {},
    );

    expect(implicit.notifications.email.secure).toBe(true);
    expect(starttls.notifications.email).toMatchObject({
      smtpPort: 2525,
      secure: false,
    });
  });

  it("rejects a non-positive polling interval", () => {
    expect(() => parseConfig({ polling: { intervalMinutes: 0 } }, {})).toThrow(
      "Config validation failed: polling.intervalMinutes must be > 0, got 0",
    );
  });

  it("takes the log level from the file, then LOG_LEVEL", () => {
    expect(parseConfig({ logging: { level: "WARN" } }, {}).logging.level).toBe(
      "warn",
    );
    expect(parseConfig({}, { LOG_LEVEL: "debug" }).logging.level).toBe("debug");
    expect(parseConfig({}, { LOG_LEVEL: "loud" }).logging.level).toBe("info");
    expect(() => parseConfig({ logging: { level: "verbose" } }, {})).toThrow(
      'Config validation failed: logging.level must be one of debug, info, warn, error, got "verbose"',
    );
  });

  it("lets DB_PATH override the database path", () => {
    const config = parseConfig(
      { database: { path: "data/other.db" } },
      { DB_PATH: "/tmp/override.db" },
    );

    expect(config.database.path).toBe("/tmp/override.db");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "job-alerts-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("expands environment references before validating", () => {
    const path = join(dir, "config.json");
    writeFileSync(
      path,
      JSON.stringify({
        notifications: {
          telegram: {
            enabled: true,
            botToken: "${TELEGRAM_BOT_TOKEN}",
            chatId: "${TELEGRAM_CHAT_ID}",
          },
          email: { smtpPort: "${SMTP_PORT}" },
        },
      }),
    );

    const config = loadConfig({
      path,
      env: {
        TELEGRAM_BOT_TOKEN: "test-token",
        TELEGRAM_CHAT_ID: "42",
        SMTP_PORT: "465",
      },
    });

    expect(config.notifications.telegram).toEqual({
      enabled: true,
      botToken: "test-token",
      chatId: "42",
    });
    expect(config.notifications.email.smtpPort).toBe(465);
  });

  it("warns about unset variables and loads the example config", () => {
    const logger = createCapturingLogger();

    const config = loadConfig({
      path: "config/config.example.json",
      env: { TELEGRAM_BOT_TOKEN: "test-token", TELEGRAM_CHAT_ID: "42" },
      logger,
    });

    expect(config.sources.map((source) => source.type)).toEqual([
      "greenhouse",
      "lever",
      "careers-page",
    ]);
    expect(config.notifications.telegram.chatId).toBe("42");
    expect(config.logging).toEqual({
      level: "info",
      file: "logs/job-alerts.log",
    });
    expect(logger.entries.map((entry) => entry.meta)).toEqual([
      { variable: "SMTP_USER" },
      { variable: "SMTP_PASSWORD" },
      { variable: "ALERT_RECIPIENT" },
    ]);
  });

  it("uses CONFIG_PATH when no path is given", () => {
    const path = join(dir, "from-env.json");
    writeFileSync(path, JSON.stringify({ polling: { intervalMinutes: 5 } }));

    expect(loadConfig({ env: { CONFIG_PATH: path } }).polling).toEqual({
      intervalMinutes: 5,
    });
  });

  it("fails on a missing file", () => {
    const path = join(dir, "missing.json");

    expect(() => loadConfig({ path, env: {} })).toThrow(
      `Config validation failed: ${path} does not exist`,
    );
  });

  it("fails on invalid JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");

    expect(() => loadConfig({ path, env: {} })).toThrow(/is not valid JSON/);
  });
});
