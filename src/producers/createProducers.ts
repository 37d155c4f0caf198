/**
 * Producer factory
 *
 * Resolves the configured sources, a closed tagged union, into producer
 * instances once at startup. Nothing downstream looks at the variant again.
 */

import type { PostingProducer } from "@/interfaces";
import type { ProducerDeps, SourceConfig } from "@/types";
import { GreenhouseProducer } from "./greenhouse/greenhouseProducer";
import { LeverProducer } from "./lever/leverProducer";
import { CareersPageProducer } from "./careersPage/careersPageProducer";

export function createProducer(
  source: SourceConfig,
  deps: ProducerDeps,
): PostingProducer {
  switch (source.type) {
    case "greenhouse":
      return new GreenhouseProducer(source, deps);
    case "lever":
      return new LeverProducer(source, deps);
    case "careers-page":
      return new CareersPageProducer(source, deps);
  }
}

/**
 * One producer per source, in configured order
 */
export function createProducers(
  sources: readonly SourceConfig[],
  deps: ProducerDeps,
): PostingProducer[] {
  const producers = sources.map((source) => createProducer(source, deps));

  deps.logger.info("Producers ready", {
    producers: producers.map((producer) => producer.name),
  });

  return producers;
}
