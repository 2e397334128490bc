import { describe, expect, it } from "vitest";
import {
  addCalendarDays,
  compareDue,
  dueSoonHorizon,
  normalizeDueDate,
  toCalendarDate,
} from "../src/core/dates";

describe("dates", () => {
  const REFERENCE = new Date(2025, 2, 3, 12);

  describe("normalizeDueDate", () => {
    it.each(["", "   ", "none", "NaN", "N/A", "na", " None "])(
      "should treat %j as unknown",
      (raw) => {
        expect(normalizeDueDate(raw, REFERENCE)).toBeNull();
      }
    );

    it("should treat missing values as unknown", () => {
      expect(normalizeDueDate(null, REFERENCE)).toBeNull();
      expect(normalizeDueDate(undefined, REFERENCE)).toBeNull();
    });

    it("should read an ambiguous two-digit-year slash date as month first", () => {
      // day/month/4-digit-year cannot consume "25", so month/day/yy wins
      expect(normalizeDueDate("03/04/25", REFERENCE)).toBe("2025-03-04");
    });

    it("should read a four-digit-year slash date as day first", () => {
      expect(normalizeDueDate("03/04/2025", REFERENCE)).toBe("2025-04-03");
      expect(normalizeDueDate("13/04/2025", REFERENCE)).toBe("2025-04-13");
    });

    it("should fall through to month first when the day-first reading is invalid", () => {
      expect(normalizeDueDate("04/13/2025", REFERENCE)).toBe("2025-04-13");
    });

    it("should read dashed dates as day first", () => {
      expect(normalizeDueDate("03-04-2025", REFERENCE)).toBe("2025-04-03");
      expect(normalizeDueDate("03-04-25", REFERENCE)).toBe("2025-04-03");
    });

    it("should read ISO dates", () => {
      expect(normalizeDueDate("2025-03-04", REFERENCE)).toBe("2025-03-04");
      expect(normalizeDueDate("  2025-03-04 ", REFERENCE)).toBe("2025-03-04");
    });

    it("should read abbreviated month names", () => {
      expect(normalizeDueDate("Mar 12, 2025", REFERENCE)).toBe("2025-03-12");
      expect(normalizeDueDate("mar 12, 2025", REFERENCE)).toBe("2025-03-12");
    });

    it("should pivot two-digit years at 69", () => {
      expect(normalizeDueDate("15-08-68", REFERENCE)).toBe("2068-08-15");
      expect(normalizeDueDate("15-08-69", REFERENCE)).toBe("1969-08-15");
      expect(normalizeDueDate("08/15/99", REFERENCE)).toBe("1999-08-15");
    });

    it("should fall back to natural language for prose dates", () => {
      const reference = new Date(2025, 2, 3, 12);
      expect(normalizeDueDate("tomorrow", reference)).toBe("2025-03-04");
      expect(normalizeDueDate("March 12, 2025", reference)).toBe("2025-03-12");
    });

    it("should return unknown for text that is not a date", () => {
      expect(normalizeDueDate("TBD", new Date(2025, 2, 3, 12))).toBeNull();
    });

    it("should treat years outside four digits as unknown", () => {
      expect(normalizeDueDate("01/01/0999", REFERENCE)).toBeNull();
      expect(normalizeDueDate("01/01/1000", REFERENCE)).toBe("1000-01-01");
    });

    it("should decide each value on its own", () => {
      const raws = ["13/04/2025", "04/13/2025"];
      expect(raws.map((raw) => normalizeDueDate(raw, REFERENCE))).toEqual([
        "2025-04-13",
        "2025-04-13",
      ]);
    });
  });

  describe("calendar helpers", () => {
    it("should format local dates without time", () => {
      expect(toCalendarDate(new Date(2025, 2, 10, 23, 59))).toBe("2025-03-10");
    });

    it("should zero-pad years below 1000", () => {
      const date = new Date(2025, 0, 15);
      date.setFullYear(999);
      expect(toCalendarDate(date)).toBe("0999-01-15");
    });

    it("should add days across month ends", () => {
      expect(addCalendarDays("2025-02-26", 7)).toBe("2025-03-05");
      expect(dueSoonHorizon("2025-03-10")).toBe("2025-03-17");
    });

    it("should order dates ascending with unknown last", () => {
      const dues = ["2025-03-10", null, "2025-03-01", null, "2025-03-05"];
      expect([...dues].sort(compareDue)).toEqual([
        "2025-03-01",
        "2025-03-05",
        "2025-03-10",
        null,
        null,
      ]);
    });
  });
});
