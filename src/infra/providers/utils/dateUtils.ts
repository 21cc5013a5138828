/**
 * Shared date utilities for provider adapters.
 */

/**
 * Parses provider timestamps (ISO 8601 or RFC 822); unparseable values become null.
 */
export const parsePublishedAt = (
  value: string | number | null | undefined,
): Date | null => {
  if (value === null || value === undefined || value === "") {
    return null;
  }

  const parsed =
    typeof value === "number" ? new Date(value * 1000) : new Date(value);

  return Number.isNaN(parsed.getTime()) ? null : parsed;
};
