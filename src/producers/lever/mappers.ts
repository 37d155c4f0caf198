/**
 * Lever API payload mappers — validate Lever responses and convert
 * postings to PostingInput
 */

import type { PostingInput } from "@/types";
import type { LeverPosting } from "@/types/clients/lever";
import { LEVER_MAX_DESCRIPTION_CHARS } from "@/constants";
import { htmlToText, isRecord, truncate } from "@/utils";

function optionalString(value: unknown): boolean {
  return value === undefined || value === null || typeof value === "string";
}

export function isLeverPosting(value: unknown): value is LeverPosting {
  if (!isRecord(value)) {
    return false;
  }

  if (
    typeof value.id !== "string" ||
    typeof value.text !== "string" ||
    value.text.trim() === "" ||
    typeof value.hostedUrl !== "string" ||
    value.hostedUrl.trim() === ""
  ) {
    return false;
  }

  if (
    !optionalString(value.description) ||
    !optionalString(value.descriptionPlain) ||
    !optionalString(value.additionalPlain)
  ) {
    return false;
  }

  const categories = value.categories;
  if (categories !== undefined && categories !== null) {
    if (
      !isRecord(categories) ||
      !optionalString(categories.location) ||
      !optionalString(categories.commitment)
    ) {
      return false;
    }
    const allLocations = categories.allLocations;
    if (
      allLocations !== undefined &&
      allLocations !== null &&
      !(
        Array.isArray(allLocations) &&
        allLocations.every((location) => typeof location === "string")
      )
    ) {
      return false;
    }
  }

  const lists = value.lists;
  if (lists === undefined || lists === null) {
    return true;
  }
  return (
    Array.isArray(lists) &&
    lists.every(
      (item) =>
        isRecord(item) &&
        typeof item.text === "string" &&
        typeof item.content === "string",
    )
  );
}

/**
 * GET /v0/postings/{site}?mode=json returns a bare array
 *
 * @throws {Error} When the payload is not an array
 */
export function readLeverPostings(payload: unknown): unknown[] {
  if (!Array.isArray(payload)) {
    throw new Error("Malformed Lever response: expected an array");
  }
  return payload;
}

/**
 * Plain description, then each list section, then the closing text
 */
function buildDescription(posting: LeverPosting): string {
  const intro =
    posting.descriptionPlain?.trim() ||
    (posting.description ? htmlToText(posting.description) : "");

  const sections = (posting.lists ?? []).map(
    (list) => `${list.text.trim()}: ${htmlToText(list.content)}`,
  );

  const parts = [intro, ...sections, posting.additionalPlain?.trim() ?? ""];

  return truncate(
    parts.filter((part) => part.length > 0).join("\n\n"),
    LEVER_MAX_DESCRIPTION_CHARS,
  );
}

function buildLocation(posting: LeverPosting): string {
  const categories = posting.categories;
  if (!categories) {
    return "";
  }
  if (categories.location?.trim()) {
    return categories.location.trim();
  }
  return (categories.allLocations ?? []).join(", ");
}

/**
 * Map Lever posting to PostingInput
 */
export function mapLeverPosting(
  posting: LeverPosting,
  company: string,
): PostingInput {
  return {
    url: posting.hostedUrl.trim(),
    company,
    title: posting.text.trim(),
    location: buildLocation(posting),
    employmentType: posting.categories?.commitment?.trim() ?? "",
    description: buildDescription(posting),
  };
}
