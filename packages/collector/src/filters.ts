import type { RankingMode, ResolutionBound, TimeWindow } from "@sampler/types";
import { z } from "zod";
import { InvalidFilterError } from "./errors.js";

export const rankingModeSchema = z.enum(["new", "hot", "top"]);
export const timeWindowSchema = z.enum(["all", "day", "hour", "month", "week", "year"]);

export const RANKING_MODES: readonly RankingMode[] = rankingModeSchema.options;
export const TIME_WINDOWS: readonly TimeWindow[] = timeWindowSchema.options;

/** Window used for "top" listings when the caller gives none. */
export const DEFAULT_TOP_TIME_WINDOW: TimeWindow = "all";

/** Most posts the platform will list for one subreddit and ranking. */
export const PLATFORM_MAX_POSTS = 1000;

export interface ListingFilters {
  readonly mode: RankingMode;
  /** Always set for "top", always `null` otherwise. */
  readonly timeWindow: TimeWindow | null;
}

export function parseRankingMode(value: string): RankingMode {
  const parsed = rankingModeSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new InvalidFilterError(`Invalid post filter used: ${value}`);
  }
  return parsed.data;
}

export function parseTimeWindow(value: string | null | undefined): TimeWindow | null {
  if (value === null || value === undefined) {
    return null;
  }

  const parsed = timeWindowSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new InvalidFilterError(`Invalid time window used: ${value}`);
  }
  return parsed.data;
}

/**
 * Checks the ranking mode and time window before any request is made.
 * A "top" listing without a window falls back to {@link DEFAULT_TOP_TIME_WINDOW};
 * a window passed with "new" or "hot" is validated, then dropped.
 */
export function validateFilters(
  mode: string,
  timeWindow?: string | null,
): ListingFilters {
  const parsedMode = parseRankingMode(mode);
  const parsedWindow = parseTimeWindow(timeWindow);

  if (parsedMode !== "top") {
    return { mode: parsedMode, timeWindow: null };
  }

  return { mode: parsedMode, timeWindow: parsedWindow ?? DEFAULT_TOP_TIME_WINDOW };
}

export function validatePostLimit(limit: number | null | undefined): number | null {
  if (limit === null || limit === undefined) {
    return null;
  }
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidFilterError(`Invalid post limit used: ${limit}`);
  }
  return limit;
}

export function validateResolutionBound(bound: ResolutionBound | undefined): ResolutionBound {
  if (bound === undefined) {
    return 0;
  }
  if (bound === "unbounded") {
    return bound;
  }
  if (!Number.isInteger(bound) || bound < 0) {
    throw new InvalidFilterError(`Invalid resolution bound used: ${bound}`);
  }
  return bound;
}
