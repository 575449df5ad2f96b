import { type ConversionResult, fail, ok } from "../errors";
import { CONVERSION_ERROR_CODES } from "../types";
import type { Separator, SeparatorSettings, ThousandGrouping } from "./types";

// ============================================================================
// Named Separators
// ============================================================================

export const SEPARATORS = {
	COMMA: ",",
	DOT: ".",
	SPACE: " ",
	APOSTROPHE: "'",
	NONE: "",
} as const;

/** Symbols that would be read as part of the number itself */
const RESERVED_SYMBOL = /^[0-9+-]$/;

function symbolLength(symbol: string): number {
	return Array.from(symbol).length;
}

/**
 * Validate a custom separator symbol (any single code point that is not a
 * digit or sign).
 */
export function customSeparator(symbol: string): ConversionResult<Separator> {
	if (symbolLength(symbol) !== 1 || RESERVED_SYMBOL.test(symbol)) {
		return fail(
			CONVERSION_ERROR_CODES.INVALID_SEPARATORS,
			`Separator must be a single non-digit symbol, got ${JSON.stringify(symbol)}`
		);
	}
	return ok(symbol);
}

// ============================================================================
// Settings Construction
// ============================================================================

/**
 * Check that a separator pair can be used for classification and formatting.
 */
export function validateSeparatorSettings(
	settings: SeparatorSettings
): ConversionResult<SeparatorSettings> {
	const { thousandSeparator, decimalSeparator } = settings;

	if (decimalSeparator === SEPARATORS.NONE) {
		return fail(CONVERSION_ERROR_CODES.INVALID_SEPARATORS, "Decimal separator cannot be empty");
	}

	const decimal = customSeparator(decimalSeparator);
	if (!decimal.ok) return decimal;

	if (thousandSeparator !== SEPARATORS.NONE) {
		const thousand = customSeparator(thousandSeparator);
		if (!thousand.ok) return thousand;
	}

	if (thousandSeparator === decimalSeparator) {
		return fail(
			CONVERSION_ERROR_CODES.INVALID_SEPARATORS,
			`Thousand and decimal separators must differ, both are ${JSON.stringify(decimalSeparator)}`
		);
	}

	return ok(settings);
}

/**
 * Build explicit separator settings.
 */
export function createSeparatorSettings(
	thousandSeparator: Separator,
	decimalSeparator: Separator,
	grouping: ThousandGrouping = "three"
): ConversionResult<SeparatorSettings> {
	return validateSeparatorSettings(
		Object.freeze({ thousandSeparator, decimalSeparator, grouping })
	);
}
