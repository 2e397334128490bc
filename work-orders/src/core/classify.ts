import { CalendarDate, Category, ClassifiedRecord, DueDate, WorkOrderUpdate } from "./dto";
import { parseISO } from "date-fns";
import { normalizeDueDate, toCalendarDate } from "./dates";

export const OVERDUE_TERMS = ["overdue", "late"];
export const COMPLETION_TERMS = [
  "complete",
  "submitted",
  "payment",
  "finished",
  "done",
  "received",
];
export const WEEKDAYS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
];
export const PROGRESS_TERMS = [
  "ongoing",
  "progress",
  "will be",
  "try to",
  "today",
  "tomorrow",
  ...WEEKDAYS,
];
export const PENDING_TERMS = ["waiting", "pending", "bid", "pricing", "activation"];

export interface ClassificationInput {
  text: string; // trimmed, lower-cased status
  due: DueDate;
  today: CalendarDate;
}

export interface ClassificationRule {
  name: string;
  category: Category;
  matches(input: ClassificationInput): boolean;
}

const mentions = (terms: string[]) => (input: ClassificationInput) =>
  terms.some((term) => input.text.includes(term));

/**
 * Evaluated top-down; the first rule that matches decides. An explicit
 * "overdue" in the text wins over a future date, and completion language
 * wins over a past one.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { name: "overdue-keyword", category: "Overdue", matches: mentions(OVERDUE_TERMS) },
  { name: "completion-keyword", category: "Completed", matches: mentions(COMPLETION_TERMS) },
  {
    name: "past-due-date",
    category: "Overdue",
    matches: ({ due, today }) => due !== null && due < today,
  },
  { name: "progress-keyword", category: "InProgress", matches: mentions(PROGRESS_TERMS) },
  { name: "pending-keyword", category: "PendingBid", matches: mentions(PENDING_TERMS) },
];

export const FALLBACK_RULE = "no-match";

function toInput(statusText: string, due: DueDate, today: Date | CalendarDate): ClassificationInput {
  return {
    text: statusText.trim().toLowerCase(),
    due,
    today: typeof today === "string" ? today : toCalendarDate(today),
  };
}

/**
 * Name of the rule that decides the category, or "no-match" for Other.
 */
export function explainClassification(
  statusText: string,
  due: DueDate,
  today: Date | CalendarDate
): string {
  const input = toInput(statusText, due, today);
  return CLASSIFICATION_RULES.find((rule) => rule.matches(input))?.name ?? FALLBACK_RULE;
}

export function classifyStatus(
  statusText: string,
  due: DueDate,
  today: Date | CalendarDate
): Category {
  const input = toInput(statusText, due, today);
  return CLASSIFICATION_RULES.find((rule) => rule.matches(input))?.category ?? "Other";
}

// Prose due dates are read relative to the day being evaluated
function anchorOf(today: Date | CalendarDate): Date {
  return typeof today === "string" ? parseISO(today) : today;
}

export function classifyUpdate(
  update: WorkOrderUpdate,
  today: Date | CalendarDate,
  reference: Date = anchorOf(today)
): ClassifiedRecord {
  const due = normalizeDueDate(update.dueDateRaw, reference);
  return { ...update, due, category: classifyStatus(update.statusText, due, today) };
}

export function classifyAll(
  updates: WorkOrderUpdate[],
  today: Date | CalendarDate,
  reference: Date = anchorOf(today)
): ClassifiedRecord[] {
  return updates.map((update) => classifyUpdate(update, today, reference));
}
