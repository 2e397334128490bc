import {
  CalendarDate,
  Category,
  ClassifiedRecord,
  CrewGroup,
  CrewTally,
  DashboardMetrics,
  DueWindowCounts,
} from "./dto";
import { dueSoonHorizon } from "./dates";

export const NO_CREW: CrewTally = { name: "N/A", count: 0 };

export function emptyCategoryCounts(): Record<Category, number> {
  return {
    Completed: 0,
    Overdue: 0,
    InProgress: 0,
    PendingBid: 0,
    Other: 0,
  };
}

export function countByCategory(records: readonly ClassifiedRecord[]): Record<Category, number> {
  const counts = emptyCategoryCounts();
  for (const r of records) counts[r.category]++;
  return counts;
}

/** Percentage to one decimal place; halves round up. */
export function completionRate(completed: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((completed / total) * 1000) / 10;
}

export function isDueSoon(record: ClassifiedRecord, today: CalendarDate): boolean {
  return (
    record.due !== null &&
    record.due <= dueSoonHorizon(today) &&
    record.category !== "Completed"
  );
}

const hasCrew = (r: ClassifiedRecord) => r.crewName.trim() !== "";

/**
 * Crew groups in first-seen order. Names are compared exactly as written.
 */
export function groupByCrew(records: readonly ClassifiedRecord[]): CrewGroup[] {
  const groups = new Map<string, CrewGroup>();
  for (const r of records) {
    if (!hasCrew(r)) continue;
    let group = groups.get(r.crewName);
    if (!group) {
      group = { name: r.crewName, count: 0, byCategory: emptyCategoryCounts() };
      groups.set(r.crewName, group);
    }
    group.count++;
    group.byCategory[r.category]++;
  }
  return [...groups.values()];
}

export function topCrew(groups: readonly CrewTally[]): CrewTally {
  let best: CrewTally = NO_CREW;
  for (const g of groups) {
    // strict > keeps the earliest crew on ties
    if (g.count > best.count) best = { name: g.name, count: g.count };
  }
  return best;
}

export function groupByDueWindow(
  records: readonly ClassifiedRecord[],
  today: CalendarDate
): DueWindowCounts {
  const horizon = dueSoonHorizon(today);
  const counts: DueWindowCounts = { past: 0, dueSoon: 0, later: 0, unknown: 0 };
  for (const { due } of records) {
    if (due === null) counts.unknown++;
    else if (due < today) counts.past++;
    else if (due <= horizon) counts.dueSoon++;
    else counts.later++;
  }
  return counts;
}

export function summarize(
  records: readonly ClassifiedRecord[],
  today: CalendarDate
): DashboardMetrics {
  const countsByCategory = countByCategory(records);
  const crews = groupByCrew(records);

  return {
    total: records.length,
    countsByCategory,
    completionRate: completionRate(countsByCategory.Completed, records.length),
    distinctCrewCount: crews.length,
    topCrew: topCrew(crews),
    dueSoonCount: records.filter((r) => isDueSoon(r, today)).length,
  };
}
