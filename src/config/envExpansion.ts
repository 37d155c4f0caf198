/**
 * ${VAR_NAME} expansion over parsed JSON
 */

import { ENV_REFERENCE_PATTERN } from "@/constants";

export type Env = Record<string, string | undefined>;

/**
 * Replace every ${VAR} in a string.
 *
 * References to unset variables are left as written and reported through
 * `unresolved`.
 */
export function expandEnvString(
  value: string,
  env: Env,
  unresolved: Set<string> = new Set(),
): string {
  return value.replace(ENV_REFERENCE_PATTERN, (reference, name: string) => {
    const replacement = env[name.trim()];
    if (replacement === undefined) {
      unresolved.add(name.trim());
      return reference;
    }
    return replacement;
  });
}

/**
 * Expand references in every string of a JSON value (objects and arrays
 * recursively). Keys are not expanded.
 */
export function expandEnvReferences(
  value: unknown,
  env: Env,
  unresolved: Set<string> = new Set(),
): unknown {
  if (typeof value === "string") {
    return expandEnvString(value, env, unresolved);
  }

  if (Array.isArray(value)) {
    return value.map((item) => expandEnvReferences(item, env, unresolved));
  }

  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        expandEnvReferences(item, env, unresolved),
      ]),
    );
  }

  return value;
}
