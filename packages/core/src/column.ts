import { NumericString } from "./classifier";
import { type Culture, DEFAULT_CULTURE, type SeparatorSettings } from "./culture";
import type { NumericTarget } from "./parser";
import {
	type ColumnConversionResult,
	CONVERSION_ERROR_CODES,
	type ConversionIssue,
	ERROR_MESSAGES,
} from "./types";

// ============================================================================
// Column Conversion Options
// ============================================================================

export interface ConvertColumnOptions {
	/** Culture of the cells. Default: 'en'. Ignored when `settings` is set */
	culture?: Culture;
	/** Explicit separators, overriding `culture` */
	settings?: SeparatorSettings;
	/** Report empty cells as NOT_NUMERIC. Default: false */
	required?: boolean;
	/** Stop once this many issues are reported. Default: Infinity */
	maxIssues?: number;
}

// ============================================================================
// Column Conversion
// ============================================================================

/**
 * Convert a column of cells (e.g. one CSV column) in a single pass.
 * Empty cells become null; failing cells become null and are reported.
 */
export function convertColumn<T extends number | bigint>(
	values: readonly string[],
	target: NumericTarget<T>,
	options: ConvertColumnOptions = {}
): ColumnConversionResult<T> {
	const choice = options.settings ?? options.culture ?? DEFAULT_CULTURE;
	const required = options.required ?? false;
	const maxIssues = options.maxIssues ?? Number.POSITIVE_INFINITY;

	const converted: (T | null)[] = [];
	const issues: ConversionIssue[] = [];
	let aborted = false;

	for (let row = 0; row < values.length; row++) {
		const value = values[row];
		let issue: ConversionIssue | null = null;

		if (value === "") {
			converted.push(null);
			if (required) {
				issue = {
					row,
					value,
					code: CONVERSION_ERROR_CODES.NOT_NUMERIC,
					message: ERROR_MESSAGES.NOT_NUMERIC,
				};
			}
		} else {
			const result = new NumericString(value, choice).toNumber(target);
			if (result.ok) {
				converted.push(result.value);
			} else {
				converted.push(null);
				issue = { row, value, code: result.error.code, message: result.error.message };
			}
		}

		if (issue) {
			issues.push(issue);
			// Rows after this one are not converted
			if (issues.length >= maxIssues) {
				aborted = true;
				break;
			}
		}
	}

	return {
		values: converted,
		issues,
		valid: issues.length === 0,
		aborted,
	};
}
