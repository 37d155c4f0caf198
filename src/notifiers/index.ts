/**
 * Notifiers barrel exports
 */

export { createChannels } from "./createChannels";
export type { ChannelDeps } from "./createChannels";
export { TelegramChannel } from "./telegram/telegramChannel";
export type {
  TelegramChannelDeps,
  TelegramMessenger,
} from "./telegram/telegramChannel";
export { EmailChannel } from "./email/emailChannel";
export type { EmailChannelDeps, MailTransport } from "./email/emailChannel";
export { sendEach } from "./batch";
export * from "./formatting";
