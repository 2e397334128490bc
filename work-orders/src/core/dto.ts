export type ISO = string;
export type CalendarDate = string; // yyyy-MM-dd, day granularity

// null means the raw value was empty or could not be parsed
export type DueDate = CalendarDate | null;

export const CATEGORIES = [
  "Completed",
  "Overdue",
  "InProgress",
  "PendingBid",
  "Other",
] as const;

export type Category = (typeof CATEGORIES)[number];

export interface WorkOrderUpdate {
  propertyId: string; // not unique across the feed
  details: string;
  crewName: string;
  dueDateRaw: string;
  statusText: string;
  reason: string;
}

export interface ClassifiedRecord extends WorkOrderUpdate {
  due: DueDate;
  category: Category;
}

export interface PropertyPin {
  workOrderNumber: string;
  address: string;
  lat: number;
  lng: number;
  status: string;
  vendor: string;
  workOrderType: string;
  dueDate: string;
  completeDate: string;
  notes: string;
  detailedServicesUrl?: string;
  photosUploadUrl?: string;
}

export type FeedName = "properties" | "updates";

export interface FeedTable {
  columns: string[];
  rows: Record<string, string>[];
}

export interface FeedNotice {
  feed: FeedName;
  level: "info" | "warn" | "error";
  message: string;
}

export interface CrewTally {
  name: string;
  count: number;
}

export interface DashboardMetrics {
  total: number;
  countsByCategory: Record<Category, number>;
  completionRate: number;
  distinctCrewCount: number;
  topCrew: CrewTally;
  dueSoonCount: number;
}

export interface CrewGroup extends CrewTally {
  byCategory: Record<Category, number>;
}

export interface DueWindowCounts {
  past: number;
  dueSoon: number;
  later: number;
  unknown: number;
}

export interface Worklists {
  urgent: ClassifiedRecord[];
  overdue: ClassifiedRecord[];
  pending: ClassifiedRecord[];
  dueSoon: ClassifiedRecord[];
}

export type WorklistName = keyof Worklists;

export interface PropertyMap {
  center: [number, number]; // [lat, lng]
  pins: PropertyPin[];
  droppedRows: number;
}

export interface DashboardView {
  generatedAt: ISO;
  today: CalendarDate;
  notices: FeedNotice[];
  properties: PropertyMap;
  records: ClassifiedRecord[];
  metrics: DashboardMetrics;
  crews: CrewGroup[];
  dueWindows: DueWindowCounts;
  worklists: Worklists;
}
