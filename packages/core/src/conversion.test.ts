import { describe, expect, test } from "vitest";
import { type Culture, type SeparatorSettings, getCultureIds } from "./culture";
import { ConversionError, unwrap } from "./errors";
import { type NumericTarget, f32, f64, i8, i16, i32, i64, u8, u32, u64 } from "./parser";
import {
	toFormat,
	toFormatSeparators,
	toNumber,
	toNumberCulture,
	toNumberSeparators,
} from "./conversion";
import { CONVERSION_ERROR_CODES } from "./types";

const separators = (
	thousandSeparator: string,
	decimalSeparator: string,
	grouping: SeparatorSettings["grouping"] = "three"
): SeparatorSettings => ({ thousandSeparator, decimalSeparator, grouping });

const errorCode = (result: { ok: true } | { ok: false; error: ConversionError }) =>
	result.ok ? null : result.error.code;

// ============================================================================
// String to Number
// ============================================================================

describe("toNumber", () => {
	test("reads plain and signed integers", () => {
		expect(toNumber("1000", i32)).toEqual({ ok: true, value: 1000 });
		expect(toNumber("+1000", i64)).toEqual({ ok: true, value: 1000n });
		expect(toNumber("-1000", i64)).toEqual({ ok: true, value: -1000n });
		expect(toNumber("1000", f32)).toEqual({ ok: true, value: 1000 });
		expect(toNumber("1000.5822", f32)).toEqual({ ok: true, value: Math.fround(1000.5822) });
	});

	test("fails when the value does not fit the target", () => {
		expect(errorCode(toNumber("1000", i8))).toBe(
			CONVERSION_ERROR_CODES.UNABLE_TO_CONVERT_STRING_TO_NUMBER
		);
		expect(toNumber("1000", i32)).toEqual({ ok: true, value: 1000 });
		expect(toNumber("-10000", i16)).toEqual({ ok: true, value: -10000 });
		expect(errorCode(toNumber("-10000", i8))).toBe(
			CONVERSION_ERROR_CODES.UNABLE_TO_CONVERT_STRING_TO_NUMBER
		);
		expect(toNumber("120", u8)).toEqual({ ok: true, value: 120 });
	});

	test("non-numeric strings fail without parsing", () => {
		for (const input of ["", "x", "10*5", "2..500", "10,00,00,00"]) {
			expect(errorCode(toNumber(input, i32))).toBe(CONVERSION_ERROR_CODES.NOT_NUMERIC);
		}
	});

	test("decimals cannot be read as integers", () => {
		expect(errorCode(toNumber("1,000.5", i32))).toBe(
			CONVERSION_ERROR_CODES.UNABLE_TO_CONVERT_STRING_TO_NUMBER
		);
	});
});

describe("toNumberCulture", () => {
	test("decimal separators", () => {
		expect(toNumberCulture("10.8888", "en", f32)).toEqual({ ok: true, value: Math.fround(10.8888) });
		expect(toNumberCulture("0,10", "it", f32)).toEqual({ ok: true, value: Math.fround(0.1) });
	});

	test("decimal without integer part", () => {
		expect(toNumberCulture(",10", "it", f32)).toEqual({ ok: true, value: Math.fround(0.1) });
		expect(toNumberCulture(".5", "en", f64)).toEqual({ ok: true, value: 0.5 });
	});

	test("thousand separators", () => {
		expect(toNumberCulture("1,000", "en", i32)).toEqual({ ok: true, value: 1000 });
		expect(toNumberCulture("10 000", "fr", i32)).toEqual({ ok: true, value: 10000 });
		expect(toNumberCulture("10,000", "en", i32)).toEqual({ ok: true, value: 10000 });
	});

	test("thousand and decimal separators", () => {
		expect(toNumberCulture("1,000.8888", "en", f32)).toEqual({
			ok: true,
			value: Math.fround(1000.8888),
		});
		expect(toNumberCulture("-10 564,10", "fr", f32)).toEqual({
			ok: true,
			value: Math.fround(-10564.1),
		});
		expect(toNumberCulture("-18.888,88", "it", f32)).toEqual({
			ok: true,
			value: Math.fround(-18888.88),
		});
		expect(toNumberCulture("-10,000.80", "en", f64)).toEqual({ ok: true, value: -10000.8 });
	});

	test("indian grouping", () => {
		expect(toNumberCulture("-1,00,00,000.50", "en-IN", f64)).toEqual({
			ok: true,
			value: -10000000.5,
		});
		expect(toNumberCulture("10,00,000", "en-IN", i32)).toEqual({ ok: true, value: 1000000 });
		expect(toNumberCulture("10,00,00,00,000", "en-IN", i64)).toEqual({
			ok: true,
			value: 10000000000n,
		});
	});

	test("grouped and ungrouped literals parse to the same value", () => {
		expect(unwrap(toNumberCulture("1,234,567", "en", i32))).toBe(
			unwrap(toNumberCulture("1234567", "en", i32))
		);
		expect(unwrap(toNumberCulture("1.234.567,5", "it", f64))).toBe(
			unwrap(toNumberCulture("1234567,5", "it", f64))
		);
	});

	test("malformed grouping is not numeric", () => {
		expect(errorCode(toNumberCulture("1 0000", "fr", i32))).toBe(CONVERSION_ERROR_CODES.NOT_NUMERIC);
		expect(errorCode(toNumberCulture("1.0000", "it", i32))).toBe(CONVERSION_ERROR_CODES.NOT_NUMERIC);
	});
});

describe("toNumberSeparators", () => {
	test("apostrophe and custom separators", () => {
		expect(toNumberSeparators("-5'000.66", separators("'", "."), f32)).toEqual({
			ok: true,
			value: Math.fround(-5000.66),
		});
		expect(toNumberSeparators("-5{000.66", separators("{", "."), f64)).toEqual({
			ok: true,
			value: -5000.66,
		});
		expect(toNumberSeparators("-5🍓000🦀66", separators("🍓", "🦀"), f64)).toEqual({
			ok: true,
			value: -5000.66,
		});
		expect(toNumberSeparators("10🥦000🥦000🦀80", separators("🥦", "🦀"), f64)).toEqual({
			ok: true,
			value: 10000000.8,
		});
	});

	test("separator pairs from several conventions", () => {
		expect(toNumberSeparators("10.000.000", separators(".", ","), i32)).toEqual({
			ok: true,
			value: 10000000,
		});
		expect(toNumberSeparators("1.000,45", separators(".", ","), f64)).toEqual({
			ok: true,
			value: 1000.45,
		});
		expect(toNumberSeparators("1 00 00 000.50", separators(" ", ".", "indian"), f64)).toEqual({
			ok: true,
			value: 10000000.5,
		});
	});

	test("comma-grouped input is not numeric with space/comma separators", () => {
		expect(errorCode(toNumberSeparators("10,000,000", separators(" ", ","), i32))).toBe(
			CONVERSION_ERROR_CODES.NOT_NUMERIC
		);
	});

	test("identical separators are rejected", () => {
		expect(errorCode(toNumberSeparators("-5|000|66", separators("|", "|"), f32))).toBe(
			CONVERSION_ERROR_CODES.INVALID_SEPARATORS
		);
	});
});

// ============================================================================
// Number to String
// ============================================================================

describe("toFormat", () => {
	test("formats for a culture", () => {
		expect(toFormat(1000, "N0", "en")).toEqual({ ok: true, value: "1,000" });
		expect(toFormat(-1000, "N0", "en")).toEqual({ ok: true, value: "-1,000" });
		expect(toFormat(1000, "N2", "fr")).toEqual({ ok: true, value: "1 000,00" });
		expect(toFormat(10_000.9999, "N2", "fr")).toEqual({ ok: true, value: "10 001,00" });
		expect(toFormat(1000, "N4", "it")).toEqual({ ok: true, value: "1.000,0000" });
	});

	test("reports an invalid specifier", () => {
		expect(errorCode(toFormat(1000, "N", "en"))).toBe(CONVERSION_ERROR_CODES.INVALID_FORMAT_SPECIFIER);
	});
});

describe("toFormatSeparators", () => {
	test("formats with explicit separators", () => {
		expect(toFormatSeparators(10, "N0", separators(" ", ","))).toEqual({ ok: true, value: "10" });
		expect(toFormatSeparators(10, "N2", separators(" ", ","))).toEqual({ ok: true, value: "10,00" });
		expect(toFormatSeparators(1000, "N2", separators("'", "."))).toEqual({
			ok: true,
			value: "1'000.00",
		});
		expect(toFormatSeparators(10_000_000.9999, "N2", separators("🦀", ","))).toEqual({
			ok: true,
			value: "10🦀000🦀001,00",
		});
		expect(toFormatSeparators(1_000_000.9999, "N2", separators(",", ".", "indian"))).toEqual({
			ok: true,
			value: "10,00,001.00",
		});
	});

	test("rejects identical separators", () => {
		expect(errorCode(toFormatSeparators(1000, "N2", separators(".", ".")))).toBe(
			CONVERSION_ERROR_CODES.INVALID_SEPARATORS
		);
	});
});

// ============================================================================
// Round Trips
// ============================================================================

describe("round trips", () => {
	const integers = [0, 1, -1, 999, 1000, -1000, 123456789, -2147483648, 2147483647];

	test("N0 output parses back to the same integer in every culture", () => {
		for (const culture of getCultureIds()) {
			for (const n of integers) {
				const text = unwrap(toFormat(n, "N0", culture));
				expect(unwrap(toNumberCulture(text, culture, i32))).toBe(n);
			}
		}
	});

	test("N0 output parses back at the 64-bit limits in every culture", () => {
		const signed = [-(2n ** 63n), -1n, 0n, 2n ** 63n - 1n];
		const unsigned = [0n, 2n ** 63n, 2n ** 64n - 1n];

		for (const culture of getCultureIds()) {
			for (const n of signed) {
				const text = unwrap(toFormat(n, "N0", culture));
				expect(unwrap(toNumberCulture(text, culture, i64))).toBe(n);
			}
			for (const n of unsigned) {
				const text = unwrap(toFormat(n, "N0", culture));
				expect(unwrap(toNumberCulture(text, culture, u64))).toBe(n);
			}
		}
	});

	test("N0 output parses back at the narrow integer limits", () => {
		const cases: [number, NumericTarget<number>][] = [
			[-128, i8],
			[127, i8],
			[255, u8],
			[-32768, i16],
			[32767, i16],
			[4294967295, u32],
		];

		for (const culture of getCultureIds()) {
			for (const [n, target] of cases) {
				const text = unwrap(toFormat(n, "N0", culture));
				expect(unwrap(toNumberCulture(text, culture, target))).toBe(n);
			}
		}
	});

	test("N2 output parses back to the same float", () => {
		const cases: [number, string, Culture][] = [
			[1.0, "1,00", "fr"],
			[1000.88, "1 000,88", "fr"],
			[-1582.99, "-1,582.99", "en"],
			[1.0, "1.00", "en"],
			[100000000.1, "100.000.000,10", "it"],
			[-50.5, "-50,50", "it"],
		];

		for (const [value, text, culture] of cases) {
			expect(unwrap(toFormat(value, "N2", culture))).toBe(text);
			expect(unwrap(toNumberCulture(text, culture, f64))).toBe(value);
		}
	});

	test("unwrap throws the conversion error", () => {
		expect(() => unwrap(toNumber("abc", i32))).toThrow(ConversionError);
		expect(() => unwrap(toNumber("abc", i32))).toThrow("\"abc\" is not a number in the given culture");
	});
});
