/**
 * Diagnostic modes
 *
 * test-scrape: run every producer and print what the matcher thinks of
 * each posting. Nothing is persisted.
 * test-notify: push one sample posting through every channel.
 */

import type { Posting, PostingInput } from "@/types";
import { matchesPosting } from "@/matching";
import { createPosting } from "@/pipeline";
import { errorMessage } from "@/utils";
import type { AppContext } from "./context";

export type PrintFn = (line: string) => void;

const defaultPrint: PrintFn = (line) => console.log(line);

export type ScrapeDiagnostic = {
  producer: string;
  postings: Array<{ posting: Posting; matched: boolean }>;
  error?: string;
};

export async function testScrape(
  context: AppContext,
  print: PrintFn = defaultPrint,
): Promise<ScrapeDiagnostic[]> {
  const results: ScrapeDiagnostic[] = [];

  for (const producer of context.producers) {
    let inputs: PostingInput[];
    try {
      inputs = await producer.fetchPostings();
    } catch (error) {
      print(`\n=== ${producer.name} (failed: ${errorMessage(error)}) ===`);
      results.push({
        producer: producer.name,
        postings: [],
        error: errorMessage(error),
      });
      continue;
    }

    const postings = inputs
      .map(createPosting)
      .filter((posting): posting is Posting => posting !== null)
      .map((posting) => ({
        posting,
        matched: matchesPosting(posting, context.criteria),
      }));

    print(`\n=== ${producer.name} (${postings.length} postings) ===`);
    for (const { posting, matched } of postings) {
      print(`  [${matched ? "✓" : "✗"}] ${posting.title}`);
      print(`      Location: ${posting.location}`);
      print(`      URL: ${posting.url}`);
    }

    results.push({ producer: producer.name, postings });
  }

  return results;
}

export const SAMPLE_POSTING: Posting = Object.freeze({
  url: "https://example.com/jobs/123",
  company: "Test Company",
  title: "Software Engineer",
  location: "Remote",
  employmentType: "Full-time",
  description: "This is a test job posting.",
  firstSeenAt: null,
  notified: false,
});

export type NotifyDiagnostic = {
  channel: string;
  ok: boolean;
};

export async function testNotify(
  context: AppContext,
  print: PrintFn = defaultPrint,
): Promise<NotifyDiagnostic[]> {
  if (context.channels.length === 0) {
    print("No notification channels enabled");
    return [];
  }

  const results: NotifyDiagnostic[] = [];

  for (const channel of context.channels) {
    let ok: boolean;
    try {
      ok = await channel.send(SAMPLE_POSTING);
    } catch (error) {
      context.logger.error("Test notification threw", {
        channel: channel.name,
        error: errorMessage(error),
      });
      ok = false;
    }

    print(
      ok
        ? `✓ ${channel.name} notification sent successfully`
        : `✗ ${channel.name} notification failed`,
    );
    results.push({ channel: channel.name, ok });
  }

  return results;
}
