/**
 * TelegramChannel — one HTML message per posting through a Telegram bot
 *
 * The bot is send-only (no polling). A disabled or misconfigured channel
 * reports every delivery as failed instead of throwing.
 */

import TelegramBot from "node-telegram-bot-api";
import type { NotificationChannel } from "@/interfaces";
import type { Logger, Posting, TelegramChannelConfig } from "@/types";
import { TELEGRAM_CHANNEL_NAME } from "@/constants";
import { formatPostingHtml } from "../formatting";
import { sendEach } from "../batch";

/**
 * The part of the bot API the channel uses
 */
export interface TelegramMessenger {
  sendMessage(
    chatId: string,
    text: string,
    options: TelegramBot.SendMessageOptions,
  ): Promise<unknown>;
}

export type TelegramChannelDeps = {
  logger: Logger;
  /** Replaces the node-telegram-bot-api client (tests) */
  messenger?: TelegramMessenger;
};

export class TelegramChannel implements NotificationChannel {
  readonly name = TELEGRAM_CHANNEL_NAME;
  private readonly config: TelegramChannelConfig;
  private readonly messenger: TelegramMessenger | null;
  private readonly logger: Logger;

  constructor(config: TelegramChannelConfig, deps: TelegramChannelDeps) {
    this.config = config;
    this.logger = deps.logger.child({ channel: this.name });

    if (config.enabled && config.botToken) {
      this.messenger =
        deps.messenger ?? new TelegramBot(config.botToken, { polling: false });
    } else {
      this.messenger = null;
    }
  }

  async send(posting: Posting): Promise<boolean> {
    if (!this.messenger) {
      this.logger.debug("Telegram notifications disabled");
      return false;
    }

    if (!this.config.chatId) {
      this.logger.error("Telegram chatId not configured");
      return false;
    }

    try {
      await this.messenger.sendMessage(
        this.config.chatId,
        formatPostingHtml(posting),
        { parse_mode: "HTML", disable_web_page_preview: false },
      );
      this.logger.info("Telegram notification sent", { title: posting.title });
      return true;
    } catch (err) {
      this.logger.error("Failed to send Telegram notification", {
        url: posting.url,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  async sendBatch(postings: readonly Posting[]): Promise<number> {
    if (!this.messenger || postings.length === 0) {
      return 0;
    }
    return sendEach(
      this.name,
      postings,
      (posting) => this.send(posting),
      this.logger,
    );
  }
}
