import { describe, expect, test } from "vitest";
import { getCultureSettings } from "../culture";
import { CONVERSION_ERROR_CODES } from "../types";
import { normalizeLiteral, parse } from "./parse";
import { f64, i8, i32 } from "./targets";

const en = getCultureSettings("en");
const fr = getCultureSettings("fr");
const it = getCultureSettings("it");

// ============================================================================
// Literal Normalization Tests
// ============================================================================

describe("normalizeLiteral", () => {
	test("removes thousand separators", () => {
		expect(normalizeLiteral("1,000.8888", "thousand-decimal", en)).toBe("1000.8888");
		expect(normalizeLiteral("100.000.000,10", "thousand-decimal", it)).toBe("100000000.10");
	});

	test("replaces the decimal separator", () => {
		expect(normalizeLiteral("-10 564,10", "signed-thousand-decimal", fr)).toBe("-10564.10");
	});

	test("adds the implied zero integer part", () => {
		expect(normalizeLiteral(",10", "decimal-leading-only", it)).toBe("0.10");
		expect(normalizeLiteral("-,5", "signed-decimal-leading-only", fr)).toBe("-0.5");
	});

	test("returns null for residue that is not a literal", () => {
		expect(normalizeLiteral("1.2.3", "decimal", en)).toBeNull();
		expect(normalizeLiteral("1a", "plain-integer", en)).toBeNull();
	});
});

// ============================================================================
// Parse Tests
// ============================================================================

describe("parse", () => {
	test("parses into the requested target", () => {
		expect(parse("1,000", "thousand-integer", en, i32)).toEqual({ ok: true, value: 1000 });
		expect(parse("-10 564,10", "signed-thousand-decimal", fr, f64)).toEqual({
			ok: true,
			value: -10564.1,
		});
	});

	test("reports overflow", () => {
		const result = parse("1000", "plain-integer", en, i8);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe(CONVERSION_ERROR_CODES.UNABLE_TO_CONVERT_STRING_TO_NUMBER);
			expect(result.error.message).toBe('"1000" is out of range for i8');
		}
	});

	test("rejects decimals for integer targets", () => {
		const result = parse("1,000.5", "thousand-decimal", en, i32);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe(CONVERSION_ERROR_CODES.UNABLE_TO_CONVERT_STRING_TO_NUMBER);
			expect(result.error.message).toBe('"1,000.5" is not an integer and cannot be read as i32');
		}
	});

	test("rejects malformed input", () => {
		const result = parse("1.2.3", "decimal", en, f64);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe(CONVERSION_ERROR_CODES.UNABLE_TO_CONVERT_STRING_TO_NUMBER);
		}
	});
});
