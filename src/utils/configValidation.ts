/**
 * Config validation primitives
 *
 * Small assertion helpers used by the config loader. Validation is
 * fail-fast: the first problem throws with the offending field path.
 */

/**
 * Error thrown when the configuration file is malformed.
 */
export class ConfigValidationError extends Error {
  readonly fieldPath: string;

  constructor(fieldPath: string, message: string) {
    super(`Config validation failed: ${fieldPath} ${message}`);
    this.name = "ConfigValidationError";
    this.fieldPath = fieldPath;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Read an optional object section; absent means `{}`.
 */
export function readSection(
  parent: Record<string, unknown>,
  key: string,
  fieldPath: string,
): Record<string, unknown> {
  const value = parent[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigValidationError(
      fieldPath,
      `must be an object, got ${describe(value)}`,
    );
  }
  return value;
}

export function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new ConfigValidationError(
      fieldPath,
      `must be a string, got ${describe(value)}`,
    );
  }
  if (value.trim().length === 0) {
    throw new ConfigValidationError(
      fieldPath,
      "cannot be empty or whitespace-only",
    );
  }
}

export function readOptionalString(
  value: unknown,
  fieldPath: string,
): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigValidationError(
      fieldPath,
      `must be a string, got ${describe(value)}`,
    );
  }
  return value;
}

export function readBoolean(
  value: unknown,
  fieldPath: string,
  fallback: boolean,
): boolean {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new ConfigValidationError(
      fieldPath,
      `must be a boolean, got ${describe(value)}`,
    );
  }
  return value;
}

/**
 * Read a number, accepting numeric strings (env-expanded values are strings).
 */
export function readNumber(
  value: unknown,
  fieldPath: string,
  fallback: number,
): number {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed)) {
    throw new ConfigValidationError(
      fieldPath,
      `must be a number, got ${describe(value)}`,
    );
  }
  return parsed;
}

export function readPositiveNumber(
  value: unknown,
  fieldPath: string,
  fallback: number,
): number {
  const parsed = readNumber(value, fieldPath, fallback);
  if (parsed <= 0) {
    throw new ConfigValidationError(fieldPath, `must be > 0, got ${parsed}`);
  }
  return parsed;
}

/**
 * Read an optional list of strings; absent means `[]`.
 */
export function readStringArray(value: unknown, fieldPath: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigValidationError(
      fieldPath,
      `must be an array, got ${describe(value)}`,
    );
  }
  return value.map((item, index) => {
    if (typeof item !== "string") {
      throw new ConfigValidationError(
        `${fieldPath}[${index}]`,
        `must be a string, got ${describe(item)}`,
      );
    }
    return item;
  });
}
