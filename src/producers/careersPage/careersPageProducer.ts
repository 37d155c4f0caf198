/**
 * CareersPageProducer — listings of a plain HTML careers page
 *
 * Every anchor whose href matches the link pattern is one posting: the
 * anchor text is the title and the resolved href the URL. Only the given
 * page is read; no pagination, no detail pages, no script rendering.
 */

import type { PostingProducer } from "@/interfaces";
import type {
  CareersPageSourceConfig,
  HttpRequestFn,
  Logger,
  PostingInput,
  ProducerDeps,
} from "@/types";
import { createHttpClient } from "@/clients/http";
import {
  CAREERS_PAGE_HTTP_HEADERS,
  CAREERS_PAGE_HTTP_MAX_ATTEMPTS,
  CAREERS_PAGE_HTTP_TIMEOUT_MS,
  DEFAULT_CAREERS_LINK_PATTERN,
  MAX_POSTINGS_PER_PAGE,
  MAX_TITLE_LENGTH,
  MIN_TITLE_LENGTH,
} from "@/constants";
import { extractAnchors, resolveHref } from "./htmlAnchors";

export class CareersPageProducer implements PostingProducer {
  readonly name: string;
  private readonly pageUrl: string;
  private readonly company: string;
  private readonly linkPattern: RegExp;
  private readonly httpRequest: HttpRequestFn;
  private readonly logger: Logger;

  /**
   * @throws {SyntaxError} When `linkPattern` is not a valid regex
   */
  constructor(config: CareersPageSourceConfig, deps: ProducerDeps) {
    this.name = config.name;
    this.pageUrl = config.url.trim();
    this.company = config.company ?? config.name;
    this.linkPattern = new RegExp(
      config.linkPattern ?? DEFAULT_CAREERS_LINK_PATTERN,
      "i",
    );
    this.logger = deps.logger.child({ producer: config.name });
    this.httpRequest = deps.httpRequest ?? createHttpClient(this.logger);
  }

  async fetchPostings(): Promise<PostingInput[]> {
    const html = await this.httpRequest({
      url: this.pageUrl,
      method: "GET",
      headers: { ...CAREERS_PAGE_HTTP_HEADERS },
      timeoutMs: CAREERS_PAGE_HTTP_TIMEOUT_MS,
      retry: {
        maxAttempts: CAREERS_PAGE_HTTP_MAX_ATTEMPTS,
      },
      responseType: "text",
    });

    if (typeof html !== "string") {
      throw new Error(`Careers page ${this.pageUrl} did not return HTML`);
    }

    const postings = this.extractPostings(html);

    this.logger.debug("Careers page scraped", {
      url: this.pageUrl,
      postings: postings.length,
    });

    return postings;
  }

  /**
   * Turn page HTML into postings, first occurrence of each URL wins
   */
  extractPostings(html: string): PostingInput[] {
    const seenUrls = new Set<string>();
    const postings: PostingInput[] = [];

    for (const anchor of extractAnchors(html)) {
      if (postings.length >= MAX_POSTINGS_PER_PAGE) {
        break;
      }

      if (!this.linkPattern.test(anchor.href)) {
        continue;
      }

      const url = resolveHref(anchor.href, this.pageUrl);
      if (!url || seenUrls.has(url)) {
        continue;
      }

      const title = anchor.text;
      if (title.length < MIN_TITLE_LENGTH || title.length > MAX_TITLE_LENGTH) {
        continue;
      }

      seenUrls.add(url);
      postings.push({
        url,
        company: this.company,
        title,
        location: "",
        employmentType: "",
        description: "",
      });
    }

    return postings;
  }
}
