import { NumericString } from "./classifier";
import { type Culture, DEFAULT_CULTURE, type SeparatorSettings, resolveSettings } from "./culture";
import type { ConversionResult } from "./errors";
import { format } from "./format";
import type { NumericTarget } from "./parser";

// ============================================================================
// String to Number
// ============================================================================

/**
 * Convert a string written in the default culture.
 *
 * @example
 * toNumber("1,000", i32) // { ok: true, value: 1000 }
 * toNumber("1000", i8)   // fails: out of range
 */
export function toNumber<T extends number | bigint>(
	input: string,
	target: NumericTarget<T>
): ConversionResult<T> {
	return new NumericString(input, DEFAULT_CULTURE).toNumber(target);
}

/**
 * Convert a string written in the given culture.
 *
 * @example
 * toNumberCulture("-10 564,10", "fr", f64) // { ok: true, value: -10564.1 }
 */
export function toNumberCulture<T extends number | bigint>(
	input: string,
	culture: Culture,
	target: NumericTarget<T>
): ConversionResult<T> {
	return new NumericString(input, culture).toNumber(target);
}

/**
 * Convert a string written with explicit separators.
 */
export function toNumberSeparators<T extends number | bigint>(
	input: string,
	settings: SeparatorSettings,
	target: NumericTarget<T>
): ConversionResult<T> {
	return new NumericString(input, settings).toNumber(target);
}

// ============================================================================
// Number to String
// ============================================================================

/**
 * Format a value for a culture with an `N<digits>` specifier.
 *
 * @example
 * toFormat(10_000.9999, "N2", "fr") // { ok: true, value: "10 001,00" }
 */
export function toFormat(
	value: number | bigint,
	specifier: string,
	culture: Culture
): ConversionResult<string> {
	const settings = resolveSettings(culture);
	if (!settings.ok) return settings;

	return format(value, specifier, settings.value);
}

/**
 * Format a value with explicit separators.
 */
export function toFormatSeparators(
	value: number | bigint,
	specifier: string,
	settings: SeparatorSettings
): ConversionResult<string> {
	return format(value, specifier, settings);
}
