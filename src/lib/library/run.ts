import type { Logger } from "@/lib/logger";

/** Diagnostics for one pipeline run; never shared between runs. */
export type RunStats = {
  sidecarsFound: number;
  parsed: number;
  dangling: number;
  unloaded: number;
  duplicated: number;
  versionDuplicatesRemoved: number;
  phantomsRemoved: number;
  badDates: number;
  invalidValues: number;
  filtered: number;
  elapsedMs: number;
};

export type RunContext = {
  stats: RunStats;
  logger: Logger;
  signal?: AbortSignal;
};

export function createRunStats(): RunStats {
  return {
    sidecarsFound: 0,
    parsed: 0,
    dangling: 0,
    unloaded: 0,
    duplicated: 0,
    versionDuplicatesRemoved: 0,
    phantomsRemoved: 0,
    badDates: 0,
    invalidValues: 0,
    filtered: 0,
    elapsedMs: 0,
  };
}
