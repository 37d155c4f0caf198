/**
 * Pipeline type definitions
 *
 * Shapes shared by the cycle orchestrator and the runner.
 */

import type { Logger } from "./logger";
import type { MatchCriteria, SimilarityFn } from "./matching";
import type { PostingProducer } from "@/interfaces/producers/postingProducer";
import type { NotificationChannel } from "@/interfaces/notifiers/notificationChannel";
import type { PostingStore } from "@/interfaces/store/postingStore";

/**
 * Outcome of a single producer invocation within a cycle
 */
export type ProducerOutcome = {
  name: string;
  status: "ok" | "error";
  /** Postings yielded (0 on error) */
  count: number;
  error?: string;
};

/**
 * Outcome of a single channel delivery within a cycle
 *
 * - delivered: every posting of the batch was reported delivered
 * - partial: some, but not all, postings were delivered
 * - failed: the channel reported zero deliveries
 * - error: the channel threw
 */
export type ChannelOutcome = {
  name: string;
  status: "delivered" | "partial" | "failed" | "error";
  attempted: number;
  delivered: number;
  error?: string;
};

export type CycleStatus = "completed" | "skipped";

/**
 * Report returned by every cycle
 */
export type CycleReport = {
  status: CycleStatus;
  startedAt: string;
  finishedAt: string;
  /** Postings yielded by all producers */
  collected: number;
  /** Postings accepted by the matcher */
  matched: number;
  /** Accepted postings persisted for the first time */
  newPostings: number;
  /** Postings handed to channels (new plus backlog), delivered or not */
  toDeliver: number;
  /** Postings whose notified flag was set this cycle */
  markedNotified: number;
  producers: ProducerOutcome[];
  channels: ChannelOutcome[];
};

export type CycleOptions = {
  /**
   * Also deliver postings persisted by earlier cycles that no channel
   * has confirmed yet. Defaults to false.
   */
  retryUnnotified?: boolean;
};

/**
 * Everything one cycle needs
 */
export type CycleDeps = {
  producers: readonly PostingProducer[];
  criteria: MatchCriteria;
  store: PostingStore;
  channels: readonly NotificationChannel[];
  logger: Logger;
  options?: CycleOptions;
  /** Overrides the matcher's similarity function (fuzzy mode) */
  similarity?: SimilarityFn;
};
