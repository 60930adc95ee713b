/**
 * Reporting of the added/ignored counters a stage accumulates
 */

import type { Logger } from "../types/logger.js";
import type { Counters, ItemStore } from "./item-store.js";

export const formatCounters = (counters: Counters): string | undefined => {
  if (counters.added === 0 && counters.ignored === 0) return undefined;
  if (counters.ignored === 0) return `Items added: ${counters.added}`;
  return `Items added: ${counters.added}, ignored: ${counters.ignored}`;
};

/**
 * Drain the store's counters and log them. Returns what was drained so the
 * stage driver can keep its own totals.
 */
export const reportCounters = (store: ItemStore, logger: Logger): Counters => {
  const counters = store.drainCounters();
  const line = formatCounters(counters);
  if (line) logger.info(line);
  return counters;
};
