/**
 * Application context
 *
 * Everything a runner mode needs, built once at startup from the config.
 */

import type {
  NotificationChannel,
  PostingProducer,
  PostingStore,
} from "@/interfaces";
import type { AppConfig, HttpRequestFn, Logger, MatchCriteria } from "@/types";
import { compileCriteria } from "@/matching";
import { createProducers } from "@/producers";
import { createChannels } from "@/notifiers";
import type { ChannelDeps } from "@/notifiers";
import { createSqlitePostingStore } from "@/db";
import { CyclePipeline } from "@/pipeline";

export type AppContext = {
  config: AppConfig;
  logger: Logger;
  criteria: MatchCriteria;
  producers: PostingProducer[];
  channels: NotificationChannel[];
  store: PostingStore;
  pipeline: CyclePipeline;
};

/**
 * Collaborators that replace the network-facing defaults (tests)
 */
export type AppContextOverrides = {
  httpRequest?: HttpRequestFn;
  telegramMessenger?: ChannelDeps["telegramMessenger"];
  mailTransport?: ChannelDeps["mailTransport"];
  store?: PostingStore;
};

export function createAppContext(
  config: AppConfig,
  logger: Logger,
  overrides: AppContextOverrides = {},
): AppContext {
  const criteria = compileCriteria(config.criteria, logger);
  const producers = createProducers(config.sources, {
    logger,
    httpRequest: overrides.httpRequest,
  });
  const channels = createChannels(config.notifications, {
    logger,
    telegramMessenger: overrides.telegramMessenger,
    mailTransport: overrides.mailTransport,
  });
  const store = overrides.store ?? createSqlitePostingStore();

  const pipeline = new CyclePipeline({
    producers,
    criteria,
    store,
    channels,
    logger: logger.child({ component: "pipeline" }),
    options: { retryUnnotified: config.pipeline.retryUnnotified },
  });

  logger.info("Context ready", {
    producers: producers.length,
    channels: channels.length,
    mode: criteria.mode,
    includeKeywords: criteria.include.length,
  });

  return { config, logger, criteria, producers, channels, store, pipeline };
}
