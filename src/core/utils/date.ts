/**
 * Date formatting utilities
 */

/** Current time as an ISO-8601 string */
export const nowIso = (): string => new Date().toISOString();

/**
 * Whole seconds elapsed between two ISO timestamps (never negative)
 */
export function secondsBetween(startIso: string, endIso: string): number {
  const ms = Date.parse(endIso) - Date.parse(startIso);
  return Number.isFinite(ms) ? Math.max(0, Math.round(ms / 1000)) : 0;
}
