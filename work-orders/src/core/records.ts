import { FeedTable, PropertyMap, PropertyPin, WorkOrderUpdate } from "./dto";
import { ColumnIndex, ColumnSpec } from "./columns";

export const UPDATE_COLUMNS = {
  propertyId: ["Property ID", "Property", "Address"],
  details: ["Details", "Description"],
  crewName: ["Crew Name", "Crew"],
  dueDateRaw: ["Due Date"],
  statusText: ["Status"],
  reason: ["Reason"],
} as const satisfies ColumnSpec;

export const PROPERTY_COLUMNS = {
  workOrderNumber: ["W/O Number"],
  address: ["address"],
  latitude: ["latitude", "lat"],
  longitude: ["longitude", "lng", "lon"],
  status: ["status"],
  vendor: ["vendor"],
  workOrderType: ["W/O Type"],
  dueDate: ["Due Date"],
  completeDate: ["Complete Date"],
  notes: ["notes"],
  detailedServices: ["Detailed Services URL", "Detailed Services"],
  attachPhotos: ["Attach Photos"],
} as const satisfies ColumnSpec;

// Shown when no property has usable coordinates
export const DEFAULT_MAP_CENTER: [number, number] = [24.0, 90.0];

const SHARED_FOLDER_MARKER = "drive.google.com/drive/folders/";

export function toUpdates(table: FeedTable): WorkOrderUpdate[] {
  const cols = ColumnIndex.of(table);
  const propertyId = cols.reader(UPDATE_COLUMNS.propertyId);
  const details = cols.reader(UPDATE_COLUMNS.details);
  const crewName = cols.reader(UPDATE_COLUMNS.crewName);
  const dueDateRaw = cols.reader(UPDATE_COLUMNS.dueDateRaw);
  const statusText = cols.reader(UPDATE_COLUMNS.statusText);
  const reason = cols.reader(UPDATE_COLUMNS.reason);

  return table.rows.map((row) => ({
    propertyId: propertyId(row),
    details: details(row),
    crewName: crewName(row),
    dueDateRaw: dueDateRaw(row),
    statusText: statusText(row),
    reason: reason(row),
  }));
}

export function parseCoordinate(value: string): number | undefined {
  const text = value.trim();
  if (text === "") return undefined;
  const num = Number(text);
  return Number.isFinite(num) ? num : undefined;
}

export function detailedServicesLink(value: string): string | undefined {
  const url = value.trim();
  return url.startsWith("http://") || url.startsWith("https://") ? url : undefined;
}

export function photosUploadLink(value: string): string | undefined {
  const url = value.trim();
  return url.includes(SHARED_FOLDER_MARKER) ? url : undefined;
}

export function mapCenter(pins: readonly PropertyPin[]): [number, number] {
  if (pins.length === 0) return DEFAULT_MAP_CENTER;
  const lat = pins.reduce((sum, p) => sum + p.lat, 0) / pins.length;
  const lng = pins.reduce((sum, p) => sum + p.lng, 0) / pins.length;
  return [lat, lng];
}

/**
 * Property pins for rows with numeric coordinates; other rows are dropped
 * and counted.
 */
export function toPropertyMap(table: FeedTable): PropertyMap {
  const cols = ColumnIndex.of(table);
  const read = {
    workOrderNumber: cols.reader(PROPERTY_COLUMNS.workOrderNumber),
    address: cols.reader(PROPERTY_COLUMNS.address),
    latitude: cols.reader(PROPERTY_COLUMNS.latitude),
    longitude: cols.reader(PROPERTY_COLUMNS.longitude),
    status: cols.reader(PROPERTY_COLUMNS.status),
    vendor: cols.reader(PROPERTY_COLUMNS.vendor),
    workOrderType: cols.reader(PROPERTY_COLUMNS.workOrderType),
    dueDate: cols.reader(PROPERTY_COLUMNS.dueDate),
    completeDate: cols.reader(PROPERTY_COLUMNS.completeDate),
    notes: cols.reader(PROPERTY_COLUMNS.notes),
    detailedServices: cols.reader(PROPERTY_COLUMNS.detailedServices),
    attachPhotos: cols.reader(PROPERTY_COLUMNS.attachPhotos),
  };

  const pins: PropertyPin[] = [];
  let droppedRows = 0;

  for (const row of table.rows) {
    const lat = parseCoordinate(read.latitude(row));
    const lng = parseCoordinate(read.longitude(row));
    if (lat === undefined || lng === undefined) {
      droppedRows++;
      continue;
    }

    pins.push({
      workOrderNumber: read.workOrderNumber(row),
      address: read.address(row),
      lat,
      lng,
      status: read.status(row),
      vendor: read.vendor(row),
      workOrderType: read.workOrderType(row),
      dueDate: read.dueDate(row),
      completeDate: read.completeDate(row),
      notes: read.notes(row),
      detailedServicesUrl: detailedServicesLink(read.detailedServices(row)),
      photosUploadUrl: photosUploadLink(read.attachPhotos(row)),
    });
  }

  return { center: mapCenter(pins), pins, droppedRows };
}
