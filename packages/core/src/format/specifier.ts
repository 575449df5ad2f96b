import { type ConversionResult, fail, ok } from "../errors";
import { CONVERSION_ERROR_CODES } from "../types";

/** Highest fractional digit count accepted by `N<digits>` */
export const MAX_FRACTION_DIGITS = 20;

const SPECIFIER = /^N([0-9]{1,2})$/;

/**
 * Parse a display specifier such as "N0" or "N2" into a fractional digit count.
 */
export function parseFormatSpecifier(specifier: string): ConversionResult<number> {
	const match = SPECIFIER.exec(specifier);
	const digits = match ? Number.parseInt(match[1], 10) : Number.NaN;

	if (Number.isNaN(digits) || digits > MAX_FRACTION_DIGITS) {
		return fail(
			CONVERSION_ERROR_CODES.INVALID_FORMAT_SPECIFIER,
			`Invalid format specifier ${JSON.stringify(specifier)}, expected N0 to N${MAX_FRACTION_DIGITS}`
		);
	}

	return ok(digits);
}
