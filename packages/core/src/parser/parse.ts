import type { SeparatorSettings } from "../culture";
import { type ConversionResult, fail, ok } from "../errors";
import type { ShapeTag } from "../pattern";
import { CONVERSION_ERROR_CODES } from "../types";
import type { NumericTarget } from "./targets";

/** Decimal point used by canonical literals */
const CANONICAL_DECIMAL = ".";

const CANONICAL_LITERAL = /^[-+]?[0-9]+(?:\.[0-9]+)?$/;

function isLeadingOnly(tag: ShapeTag): boolean {
	return tag === "decimal-leading-only" || tag === "signed-decimal-leading-only";
}

// ============================================================================
// Literal Normalization
// ============================================================================

/**
 * Turn a classified string into a canonical literal (`[-+]?digits(.digits)?`).
 * Returns null if anything other than digits, one sign and one decimal point
 * remains after removing separators.
 */
export function normalizeLiteral(
	input: string,
	tag: ShapeTag,
	settings: SeparatorSettings
): string | null {
	const { thousandSeparator, decimalSeparator } = settings;

	let literal = thousandSeparator ? input.split(thousandSeparator).join("") : input;

	const decimalIndex = literal.indexOf(decimalSeparator);
	if (decimalIndex !== -1) {
		// A second decimal separator is left in place and fails validation below
		literal =
			literal.slice(0, decimalIndex) +
			CANONICAL_DECIMAL +
			literal.slice(decimalIndex + decimalSeparator.length);
	}

	if (isLeadingOnly(tag)) {
		const pointIndex = literal.indexOf(CANONICAL_DECIMAL);
		if (pointIndex !== -1) {
			literal = `${literal.slice(0, pointIndex)}0${literal.slice(pointIndex)}`;
		}
	}

	return CANONICAL_LITERAL.test(literal) ? literal : null;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Convert a classified string into the target numeric type.
 */
export function parse<T extends number | bigint>(
	input: string,
	tag: ShapeTag,
	settings: SeparatorSettings,
	target: NumericTarget<T>
): ConversionResult<T> {
	const literal = normalizeLiteral(input, tag, settings);
	if (literal === null) {
		return fail(
			CONVERSION_ERROR_CODES.UNABLE_TO_CONVERT_STRING_TO_NUMBER,
			`Malformed numeric literal ${JSON.stringify(input)}`
		);
	}

	if (target.integer && literal.includes(CANONICAL_DECIMAL)) {
		return fail(
			CONVERSION_ERROR_CODES.UNABLE_TO_CONVERT_STRING_TO_NUMBER,
			`${JSON.stringify(input)} is not an integer and cannot be read as ${target.name}`
		);
	}

	const value = target.fromLiteral(literal);
	if (value === null) {
		return fail(
			CONVERSION_ERROR_CODES.UNABLE_TO_CONVERT_STRING_TO_NUMBER,
			`${JSON.stringify(input)} is out of range for ${target.name}`
		);
	}

	return ok(value);
}
