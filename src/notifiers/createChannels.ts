/**
 * Channel factory
 *
 * Builds the enabled channels once at startup, Telegram first.
 */

import type { NotificationChannel } from "@/interfaces";
import type { Logger, NotificationsConfig } from "@/types";
import { TelegramChannel } from "./telegram/telegramChannel";
import type { TelegramMessenger } from "./telegram/telegramChannel";
import { EmailChannel } from "./email/emailChannel";
import type { MailTransport } from "./email/emailChannel";

export type ChannelDeps = {
  logger: Logger;
  telegramMessenger?: TelegramMessenger;
  mailTransport?: MailTransport;
};

export function createChannels(
  config: NotificationsConfig,
  deps: ChannelDeps,
): NotificationChannel[] {
  const channels: NotificationChannel[] = [];

  if (config.telegram.enabled) {
    channels.push(
      new TelegramChannel(config.telegram, {
        logger: deps.logger,
        messenger: deps.telegramMessenger,
      }),
    );
  }

  if (config.email.enabled) {
    channels.push(
      new EmailChannel(config.email, {
        logger: deps.logger,
        transport: deps.mailTransport,
      }),
    );
  }

  if (channels.length === 0) {
    deps.logger.warn("No notification channels enabled");
  } else {
    deps.logger.info("Channels ready", {
      channels: channels.map((channel) => channel.name),
    });
  }

  return channels;
}
