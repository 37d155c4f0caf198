/**
 * Per-item batch delivery
 */

import type { Logger, Posting } from "@/types";

/**
 * Send postings one by one and count the successes.
 *
 * A rejected `send` counts as a failure for that posting only; the rest of
 * the batch is still attempted. Never throws.
 */
export async function sendEach(
  channelName: string,
  postings: readonly Posting[],
  send: (posting: Posting) => Promise<boolean>,
  logger: Logger,
): Promise<number> {
  let successCount = 0;

  for (const posting of postings) {
    try {
      if (await send(posting)) {
        successCount++;
      }
    } catch (err) {
      logger.error("Failed to send notification", {
        channel: channelName,
        url: posting.url,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  logger.info("Batch delivered", {
    channel: channelName,
    delivered: successCount,
    total: postings.length,
  });

  return successCount;
}
