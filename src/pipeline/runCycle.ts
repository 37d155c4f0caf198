/**
 * One pipeline cycle: collect -> filter -> dedup & persist -> notify
 *
 * Producer and channel failures are isolated and recorded in the report.
 * Store failures are not caught here: they abort the cycle and reach the
 * caller.
 */

import type { NotificationChannel, PostingProducer } from "@/interfaces";
import type {
  ChannelOutcome,
  CycleDeps,
  CycleReport,
  Logger,
  Posting,
  ProducerOutcome,
} from "@/types";
import { filterPostings } from "@/matching";
import { errorMessage } from "@/utils";
import { createPosting, readPostingInput } from "./posting";
import { createEmptyReport } from "./report";

type CollectResult = {
  postings: Posting[];
  outcomes: ProducerOutcome[];
};

/**
 * Invoke producers in configured order and concatenate their output.
 * Output that is not an array counts as a producer error.
 */
async function collect(
  producers: readonly PostingProducer[],
  logger: Logger,
): Promise<CollectResult> {
  const postings: Posting[] = [];
  const outcomes: ProducerOutcome[] = [];

  for (const producer of producers) {
    const accepted: Posting[] = [];
    try {
      const raw: unknown = await producer.fetchPostings();
      if (!Array.isArray(raw)) {
        throw new Error(
          `Producer returned ${raw === null ? "null" : typeof raw} instead of an array`,
        );
      }

      const items: unknown[] = raw;
      for (const item of items) {
        const input = readPostingInput(item);
        if (!input) {
          logger.debug("Skipping malformed posting", {
            producer: producer.name,
          });
          continue;
        }

        const posting = createPosting(input);
        if (!posting) {
          logger.debug("Skipping incomplete posting", {
            producer: producer.name,
            url: input.url,
          });
          continue;
        }
        accepted.push(posting);
      }
    } catch (err) {
      logger.error("Producer failed", {
        producer: producer.name,
        error: errorMessage(err),
      });
      outcomes.push({
        name: producer.name,
        status: "error",
        count: 0,
        error: errorMessage(err),
      });
      continue;
    }

    postings.push(...accepted);
    logger.info("Producer finished", {
      producer: producer.name,
      count: accepted.length,
    });
    outcomes.push({
      name: producer.name,
      status: "ok",
      count: accepted.length,
    });
  }

  return { postings, outcomes };
}

/**
 * New postings first, then older unnotified ones not already in the list
 */
function withBacklog(
  newPostings: readonly Posting[],
  backlog: readonly Posting[],
): Posting[] {
  const urls = new Set(newPostings.map((posting) => posting.url));
  return [
    ...newPostings,
    ...backlog.filter((posting) => !urls.has(posting.url)),
  ];
}

function toChannelStatus(
  delivered: number,
  attempted: number,
): ChannelOutcome["status"] {
  if (delivered <= 0) return "failed";
  if (delivered < attempted) return "partial";
  return "delivered";
}

/**
 * Hand the batch to one channel
 *
 * @returns The outcome; `delivered` is clamped to [0, batch size]
 */
async function deliver(
  channel: NotificationChannel,
  batch: readonly Posting[],
  logger: Logger,
): Promise<ChannelOutcome> {
  let reported: number;
  try {
    reported = await channel.sendBatch(batch);
  } catch (err) {
    logger.error("Channel failed", {
      channel: channel.name,
      error: errorMessage(err),
    });
    return {
      name: channel.name,
      status: "error",
      attempted: batch.length,
      delivered: 0,
      error: errorMessage(err),
    };
  }

  const delivered = Number.isFinite(reported)
    ? Math.min(Math.max(0, Math.floor(reported)), batch.length)
    : 0;
  const status = toChannelStatus(delivered, batch.length);

  if (status === "partial") {
    logger.warn("Channel delivered part of the batch, marking all", {
      channel: channel.name,
      delivered,
      attempted: batch.length,
    });
  } else if (status === "failed") {
    logger.warn("Channel delivered nothing", {
      channel: channel.name,
      attempted: batch.length,
    });
  }

  return { name: channel.name, status, attempted: batch.length, delivered };
}

/**
 * Run exactly one cycle.
 *
 * Marking is batch-or-nothing: once a channel reports any delivery, every
 * posting of its batch is marked notified.
 */
export async function runCycle(deps: CycleDeps): Promise<CycleReport> {
  const { logger, store } = deps;
  const report = createEmptyReport("completed", new Date().toISOString());

  // 1. Collect
  const collected = await collect(deps.producers, logger);
  report.producers = collected.outcomes;
  report.collected = collected.postings.length;

  // 2. Filter
  const matched = filterPostings(collected.postings, deps.criteria, {
    logger,
    similarity: deps.similarity,
  });
  report.matched = matched.length;

  // 3. Dedup & persist
  const newPostings: Posting[] = [];
  for (const posting of matched) {
    if (store.add(posting)) {
      newPostings.push(posting);
    }
  }
  report.newPostings = newPostings.length;

  const batch = deps.options?.retryUnnotified
    ? withBacklog(newPostings, store.unnotified())
    : newPostings;
  report.toDeliver = batch.length;

  logger.info("Postings processed", {
    collected: report.collected,
    matched: report.matched,
    newPostings: report.newPostings,
    toDeliver: report.toDeliver,
  });

  // 4. Notify
  if (batch.length > 0) {
    const marked = new Set<string>();

    for (const channel of deps.channels) {
      const outcome = await deliver(channel, batch, logger);
      report.channels.push(outcome);

      if (outcome.delivered > 0) {
        for (const posting of batch) {
          if (!marked.has(posting.url)) {
            store.markNotified(posting.url);
            marked.add(posting.url);
          }
        }
      }
    }

    report.markedNotified = marked.size;
  }

  report.finishedAt = new Date().toISOString();
  return report;
}
