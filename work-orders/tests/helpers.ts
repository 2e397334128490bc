import { Logger } from "@preservation/shared-utils";
import { vi } from "vitest";
import { Category, ClassifiedRecord, DueDate } from "../src/core/dto";

export function silentLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function record(
  category: Category,
  due: DueDate = null,
  overrides: Partial<ClassifiedRecord> = {}
): ClassifiedRecord {
  return {
    propertyId: "1 Test St",
    details: "",
    crewName: "",
    dueDateRaw: due ?? "",
    statusText: "",
    reason: "",
    due,
    category,
    ...overrides,
  };
}
