import { DashboardView, FeedNotice, FeedTable } from "./dto";
import { classifyAll } from "./classify";
import { groupByCrew, groupByDueWindow, summarize } from "./aggregate";
import { toCalendarDate } from "./dates";
import { toPropertyMap, toUpdates } from "./records";
import { buildWorklists } from "./urgency";

export interface ViewInput {
  properties: FeedTable;
  updates: FeedTable;
  notices?: FeedNotice[];
}

/**
 * Derive the whole dashboard from freshly fetched tables. Pure apart from
 * `generatedAt`; every call recomputes from scratch.
 */
export function buildDashboardView(input: ViewInput, now: Date): DashboardView {
  const today = toCalendarDate(now);
  const records = classifyAll(toUpdates(input.updates), today, now);

  return {
    generatedAt: now.toISOString(),
    today,
    notices: input.notices ?? [],
    properties: toPropertyMap(input.properties),
    records,
    metrics: summarize(records, today),
    crews: groupByCrew(records),
    dueWindows: groupByDueWindow(records, today),
    worklists: buildWorklists(records, today),
  };
}
