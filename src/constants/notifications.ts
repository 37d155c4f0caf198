/**
 * Notification channel constants
 */

export const TELEGRAM_CHANNEL_NAME = "Telegram";

export const EMAIL_CHANNEL_NAME = "Email";

/**
 * Footer line appended to every message
 */
export const MESSAGE_SIGNATURE = "Sent by job-alerts";
