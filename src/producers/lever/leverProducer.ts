/**
 * LeverProducer — postings of one Lever site
 */

import type { PostingProducer } from "@/interfaces";
import type {
  HttpRequestFn,
  LeverSourceConfig,
  Logger,
  PostingInput,
  ProducerDeps,
} from "@/types";
import { createHttpClient } from "@/clients/http";
import {
  LEVER_API_BASE_URL,
  LEVER_HTTP_TIMEOUT_MS,
  LEVER_HTTP_MAX_ATTEMPTS,
  LEVER_HTTP_HEADERS,
} from "@/constants";
import { isLeverPosting, mapLeverPosting, readLeverPostings } from "./mappers";

export class LeverProducer implements PostingProducer {
  readonly name: string;
  private readonly site: string;
  private readonly company: string;
  private readonly httpRequest: HttpRequestFn;
  private readonly logger: Logger;

  constructor(config: LeverSourceConfig, deps: ProducerDeps) {
    this.name = config.name;
    this.site = config.site.trim();
    this.company = config.company ?? config.name;
    this.logger = deps.logger.child({ producer: config.name });
    this.httpRequest = deps.httpRequest ?? createHttpClient(this.logger);
  }

  async fetchPostings(): Promise<PostingInput[]> {
    const payload = await this.httpRequest({
      url: `${LEVER_API_BASE_URL}/postings/${encodeURIComponent(this.site)}`,
      method: "GET",
      query: { mode: "json" },
      headers: { ...LEVER_HTTP_HEADERS },
      timeoutMs: LEVER_HTTP_TIMEOUT_MS,
      retry: {
        maxAttempts: LEVER_HTTP_MAX_ATTEMPTS,
      },
    });

    const rawPostings = readLeverPostings(payload);
    const postings = rawPostings
      .filter(isLeverPosting)
      .map((posting) => mapLeverPosting(posting, this.company));

    this.logger.debug("Lever postings fetched and mapped", {
      site: this.site,
      totalFromApi: rawPostings.length,
      skippedMalformedCount: rawPostings.length - postings.length,
      postings: postings.length,
    });

    return postings;
  }
}
