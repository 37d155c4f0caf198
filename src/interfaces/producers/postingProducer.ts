/**
 * PostingProducer interface — contract for anything that yields candidate
 * postings (ATS boards, careers pages)
 *
 * The cycle only ever calls through this interface. Concrete variants are
 * built once at startup from the closed set of configured source types.
 */

import type { PostingInput } from "@/types";

export interface PostingProducer {
  /**
   * Stable name for logs and cycle reports (the configured source name)
   */
  readonly name: string;

  /**
   * Fetch the current postings of this source.
   *
   * May reject on network or payload errors; the caller isolates the
   * failure and treats this producer's output as empty for the cycle.
   */
  fetchPostings(): Promise<PostingInput[]>;
}
