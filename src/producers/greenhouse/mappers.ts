/**
 * Greenhouse API payload mappers — validate Greenhouse responses and convert
 * jobs to PostingInput
 */

import type { PostingInput } from "@/types";
import type { GreenhouseJob } from "@/types/clients/greenhouse";
import { GREENHOUSE_LIMITS } from "@/constants";
import { htmlToText, isRecord, truncate } from "@/utils";

function isOptionalString(value: unknown): boolean {
  return value === undefined || value === null || typeof value === "string";
}

/**
 * Structural check of one job: required fields present, optional fields
 * of the expected type when present
 */
export function isGreenhouseJob(value: unknown): value is GreenhouseJob {
  if (!isRecord(value)) {
    return false;
  }

  if (
    typeof value.id !== "number" ||
    typeof value.title !== "string" ||
    value.title.trim() === "" ||
    typeof value.absolute_url !== "string" ||
    value.absolute_url.trim() === ""
  ) {
    return false;
  }

  if (!isOptionalString(value.content)) {
    return false;
  }

  const location = value.location;
  if (location !== undefined && location !== null) {
    if (!isRecord(location) || !isOptionalString(location.name)) {
      return false;
    }
  }

  const metadata = value.metadata;
  if (metadata === undefined || metadata === null) {
    return true;
  }
  return (
    Array.isArray(metadata) &&
    metadata.every((meta) => isRecord(meta) && typeof meta.name === "string")
  );
}

/**
 * Extract the jobs array of GET /boards/{token}/jobs
 *
 * @throws {Error} When the payload is not `{ jobs: [...] }`
 */
export function readGreenhouseJobs(payload: unknown): unknown[] {
  if (!isRecord(payload) || !Array.isArray(payload.jobs)) {
    throw new Error("Malformed Greenhouse response: missing jobs array");
  }
  return payload.jobs;
}

/**
 * Find a metadata value by name (case-insensitive), first element for lists
 */
function findMetadataValue(
  job: GreenhouseJob,
  name: string,
): string | undefined {
  const field = job.metadata?.find(
    (meta) => meta.name.toLowerCase() === name,
  );
  if (!field) {
    return undefined;
  }

  const value = Array.isArray(field.value) ? field.value[0] : field.value;
  return typeof value === "string" && value.trim() !== ""
    ? value.trim()
    : undefined;
}

/**
 * Map Greenhouse job to PostingInput
 *
 * The Job Board API carries no company name; the configured one is used.
 */
export function mapGreenhouseJob(
  job: GreenhouseJob,
  company: string,
): PostingInput {
  const description = job.content
    ? truncate(htmlToText(job.content), GREENHOUSE_LIMITS.MAX_DESCRIPTION_CHARS)
    : "";

  return {
    url: job.absolute_url.trim(),
    company,
    title: job.title.trim(),
    location: job.location?.name?.trim() ?? "",
    employmentType: findMetadataValue(job, "employment type") ?? "",
    description,
  };
}
