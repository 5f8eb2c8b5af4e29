// FORMAT THEOREM: ∀s ∈ [0, 253402300799] ∩ ℤ: parseTimestamp(formatTimestamp(s)) = s
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	formatTimestamp,
	isRepresentableTimestamp,
	MAX_TIMESTAMP,
	MIN_TIMESTAMP,
	parseTimestamp,
} from "../../src/core/time.js";

describe("parseTimestamp", () => {
	it("reads the epoch and a day after it", () => {
		expect(parseTimestamp("1970-01-01T00:00:00")).toBe(0);
		expect(parseTimestamp("1970-01-02T00:00:00")).toBe(86_400);
	});

	it("accepts leap days only in leap years", () => {
		expect(parseTimestamp("2024-02-29T12:00:00")).toBe(1_709_208_000);
		expect(parseTimestamp("2023-02-29T12:00:00")).toBeNull();
	});

	it("keeps two-digit years literal", () => {
		expect(parseTimestamp("0099-01-01T00:00:00")).toBe(
			Date.parse("0099-01-01T00:00:00Z") / 1000,
		);
	});

	it.each([
		"2024-13-01T00:00:00",
		"2024-00-10T00:00:00",
		"2024-04-31T00:00:00",
		"2024-01-01T23:60:00",
		"2024-01-01T23:59:60",
		"2024-01-01T00:00:00Z",
		"2024-01-01",
	])("rejects %j", (text) => {
		expect(parseTimestamp(text)).toBeNull();
	});
});

describe("formatTimestamp", () => {
	it("renders UTC without a zone suffix", () => {
		expect(formatTimestamp(86_400)).toBe("1970-01-02T00:00:00");
	});

	it("is inverted by parseTimestamp", () => {
		fc.assert(
			fc.property(fc.integer({ min: 0, max: 253_402_300_799 }), (seconds) => {
				expect(parseTimestamp(formatTimestamp(seconds))).toBe(seconds);
			}),
		);
	});
});

describe("isRepresentableTimestamp", () => {
	it("spans the four-digit years", () => {
		expect(MIN_TIMESTAMP).toBe(parseTimestamp("0000-01-01T00:00:00"));
		expect(MAX_TIMESTAMP).toBe(parseTimestamp("9999-12-31T23:59:59"));
		expect(isRepresentableTimestamp(MIN_TIMESTAMP)).toBe(true);
		expect(isRepresentableTimestamp(MAX_TIMESTAMP)).toBe(true);
	});

	it.each([MIN_TIMESTAMP - 1, MAX_TIMESTAMP + 1, 0.5, Number.NaN, Number.NEGATIVE_INFINITY])(
		"rejects %d",
		(seconds) => {
			expect(isRepresentableTimestamp(seconds)).toBe(false);
		},
	);
});
