import { type SeparatorSettings, validateSeparatorSettings } from "../culture";
import { type ConversionResult, fail, ok } from "../errors";
import { CONVERSION_ERROR_CODES } from "../types";
import { groupDigits, isZero, roundDecimal, toDecimalParts } from "./decimal";
import { parseFormatSpecifier } from "./specifier";

// ============================================================================
// Formatting
// ============================================================================

/**
 * Render a value with `N<digits>` precision using the given separators.
 *
 * Rounding is half away from zero on the value's shortest decimal expansion,
 * so `0.125` at N2 gives `0.13`. A value that rounds to zero has no sign.
 * Settings are validated before anything is rendered.
 */
export function format(
	value: number | bigint,
	specifier: string,
	settings: SeparatorSettings
): ConversionResult<string> {
	const checked = validateSeparatorSettings(settings);
	if (!checked.ok) return checked;

	const digits = parseFormatSpecifier(specifier);
	if (!digits.ok) return digits;

	const parts = toDecimalParts(value);
	if (!parts) {
		return fail(
			CONVERSION_ERROR_CODES.UNABLE_TO_CONVERT_NUMBER_TO_STRING,
			`Cannot format non-finite value ${String(value)}`
		);
	}

	const rounded = roundDecimal(parts, digits.value);

	let text = groupDigits(rounded.integer, settings.thousandSeparator, settings.grouping);
	if (digits.value > 0) {
		text += settings.decimalSeparator + rounded.fraction;
	}

	if (rounded.negative && !isZero(rounded)) {
		text = `-${text}`;
	}

	return ok(text);
}
