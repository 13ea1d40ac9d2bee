import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../../src/errors.js";
import {
	daysAgo,
	filterDateRange,
	normalizeDate,
	validateDateRange,
} from "../../src/extract/date-range.js";

describe("normalizeDate", () => {
	it("should accept compact and ISO forms", () => {
		expect(normalizeDate(20250101)).toBe("2025-01-01");
		expect(normalizeDate("20250101")).toBe("2025-01-01");
		expect(normalizeDate(" 2025-01-01 ")).toBe("2025-01-01");
	});

	it("should reject impossible and malformed dates", () => {
		expect(normalizeDate("2025-02-30")).toBeUndefined();
		expect(normalizeDate("2025/01/01")).toBeUndefined();
		expect(normalizeDate(2025010.5)).toBeUndefined();
		expect(normalizeDate(null)).toBeUndefined();
	});

	it("should accept leap days", () => {
		expect(normalizeDate("2024-02-29")).toBe("2024-02-29");
		expect(normalizeDate("2025-02-29")).toBeUndefined();
	});
});

describe("validateDateRange", () => {
	it("should normalize both bounds", () => {
		expect(validateDateRange("20250101", "2025-01-31")).toEqual({
			start: "2025-01-01",
			end: "2025-01-31",
		});
	});

	it("should reject a start after the end", () => {
		expect(() => validateDateRange("2025-02-01", "2025-01-01")).toThrow(
			"startDate 2025-02-01 is after endDate 2025-01-01",
		);
	});

	it("should reject an invalid bound", () => {
		expect(() => validateDateRange("yesterday", "2025-01-01")).toThrow(InvalidArgumentError);
		expect(() => validateDateRange("yesterday", "2025-01-01")).toThrow(
			'startDate "yesterday" is not a valid date',
		);
	});
});

describe("filterDateRange", () => {
	const series = Array.from({ length: 10 }, (_, i) => ({
		date: `2025-01-${String(i + 1).padStart(2, "0")}`,
		clicks: i,
	}));

	it("should keep rows inside the range with both ends inclusive", () => {
		const rows = filterDateRange(series, "2025-01-04", "2025-01-06");

		expect(rows.map((r) => r.date)).toEqual(["2025-01-04", "2025-01-05", "2025-01-06"]);
	});

	it("should drop rows with unparseable dates", () => {
		const rows = filterDateRange([...series, { date: "garbage", clicks: 99 }], "2025-01-01", "2025-12-31");

		expect(rows).toHaveLength(10);
	});

	it("should compare compact row dates as calendar dates", () => {
		expect(filterDateRange([{ date: "20250105" }], "2025-01-05", "2025-01-05")).toHaveLength(1);
	});
});

describe("daysAgo", () => {
	it("should count back whole UTC days", () => {
		expect(daysAgo(3, Date.UTC(2025, 0, 10, 15))).toBe("2025-01-07");
	});
});
