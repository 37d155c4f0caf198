/**
 * NotificationChannel interface — contract for delivery channels
 */

import type { Posting } from "@/types";

export interface NotificationChannel {
  /**
   * Stable channel name for logs and cycle reports
   */
  readonly name: string;

  /**
   * Deliver one posting. Resolves false on failure.
   */
  send(posting: Posting): Promise<boolean>;

  /**
   * Deliver a batch and resolve the number of postings delivered.
   *
   * Less than `postings.length` (or 0) on partial or total failure.
   * Implementations are safe to call again with the same postings.
   */
  sendBatch(postings: readonly Posting[]): Promise<number>;
}
