import { CalendarDate, ClassifiedRecord, Worklists } from "./dto";
import { compareDue } from "./dates";
import { isDueSoon } from "./aggregate";

type Predicate = (record: ClassifiedRecord) => boolean;

function select(records: readonly ClassifiedRecord[], keep: Predicate): ClassifiedRecord[] {
  // filter() copies, so the caller's array is never reordered
  return records.filter(keep).sort((a, b) => compareDue(a.due, b.due));
}

export function selectUrgent(
  records: readonly ClassifiedRecord[],
  today: CalendarDate
): ClassifiedRecord[] {
  return select(records, (r) => r.category === "Overdue" || isDueSoon(r, today));
}

export function overdueOnly(records: readonly ClassifiedRecord[]): ClassifiedRecord[] {
  return select(records, (r) => r.category === "Overdue");
}

export function pendingOnly(records: readonly ClassifiedRecord[]): ClassifiedRecord[] {
  return select(records, (r) => r.category === "PendingBid");
}

/**
 * Includes past-due open items, so it may overlap with overdueOnly.
 */
export function dueSoonOnly(
  records: readonly ClassifiedRecord[],
  today: CalendarDate
): ClassifiedRecord[] {
  return select(records, (r) => isDueSoon(r, today));
}

export function buildWorklists(
  records: readonly ClassifiedRecord[],
  today: CalendarDate
): Worklists {
  return {
    urgent: selectUrgent(records, today),
    overdue: overdueOnly(records),
    pending: pendingOnly(records),
    dueSoon: dueSoonOnly(records, today),
  };
}
