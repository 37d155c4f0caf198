/**
 * GreenhouseProducer — postings of one Greenhouse job board
 *
 * Fetches GET /v1/boards/{token}/jobs?content=true in a single request
 * (the endpoint is not paginated).
 */

import type { PostingProducer } from "@/interfaces";
import type {
  GreenhouseSourceConfig,
  HttpRequestFn,
  Logger,
  PostingInput,
  ProducerDeps,
} from "@/types";
import { createHttpClient } from "@/clients/http";
import {
  GREENHOUSE_API_BASE_URL,
  GREENHOUSE_HTTP_TIMEOUT_MS,
  GREENHOUSE_HTTP_MAX_ATTEMPTS,
  GREENHOUSE_HTTP_HEADERS,
  GREENHOUSE_LIMITS,
} from "@/constants";
import { isGreenhouseJob, mapGreenhouseJob, readGreenhouseJobs } from "./mappers";

export class GreenhouseProducer implements PostingProducer {
  readonly name: string;
  private readonly boardToken: string;
  private readonly company: string;
  private readonly httpRequest: HttpRequestFn;
  private readonly logger: Logger;

  constructor(config: GreenhouseSourceConfig, deps: ProducerDeps) {
    this.name = config.name;
    this.boardToken = config.boardToken.trim();
    this.company = config.company ?? config.name;
    this.logger = deps.logger.child({ producer: config.name });
    this.httpRequest = deps.httpRequest ?? createHttpClient(this.logger);
  }

  /**
   * List the board's open jobs
   *
   * Jobs are sorted by id and capped so the selection is deterministic.
   * Malformed jobs are skipped; request failures propagate.
   */
  async fetchPostings(): Promise<PostingInput[]> {
    const payload = await this.httpRequest({
      url: `${GREENHOUSE_API_BASE_URL}/boards/${encodeURIComponent(this.boardToken)}/jobs`,
      method: "GET",
      query: { content: "true" },
      headers: { ...GREENHOUSE_HTTP_HEADERS },
      timeoutMs: GREENHOUSE_HTTP_TIMEOUT_MS,
      retry: {
        maxAttempts: GREENHOUSE_HTTP_MAX_ATTEMPTS,
      },
    });

    const rawJobs = readGreenhouseJobs(payload);
    const jobs = rawJobs.filter(isGreenhouseJob);
    const skippedMalformedCount = rawJobs.length - jobs.length;

    const cappedJobs = [...jobs]
      .sort((a, b) => a.id - b.id)
      .slice(0, GREENHOUSE_LIMITS.MAX_JOBS_PER_BOARD);

    const postings = cappedJobs.map((job) => mapGreenhouseJob(job, this.company));

    this.logger.debug("Greenhouse jobs fetched and mapped", {
      boardToken: this.boardToken,
      totalJobsFromApi: rawJobs.length,
      skippedMalformedCount,
      postings: postings.length,
    });

    return postings;
  }
}
