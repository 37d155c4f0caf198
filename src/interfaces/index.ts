/**
 * Interfaces barrel exports
 */

export type { PostingProducer } from "./producers/postingProducer";
export type { NotificationChannel } from "./notifiers/notificationChannel";
export type { PostingStore } from "./store/postingStore";
