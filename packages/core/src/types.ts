// ============================================================================
// Error Codes
// ============================================================================

export const CONVERSION_ERROR_CODES = {
	UNABLE_TO_CONVERT_STRING_TO_NUMBER: "UNABLE_TO_CONVERT_STRING_TO_NUMBER",
	NOT_NUMERIC: "NOT_NUMERIC",
	NO_MATCH: "NO_MATCH",
	INVALID_FORMAT_SPECIFIER: "INVALID_FORMAT_SPECIFIER",
	UNABLE_TO_CONVERT_NUMBER_TO_STRING: "UNABLE_TO_CONVERT_NUMBER_TO_STRING",
	PATTERN_CULTURE_NOT_FOUND: "PATTERN_CULTURE_NOT_FOUND",
	INVALID_SEPARATORS: "INVALID_SEPARATORS",
} as const;

export type ConversionErrorCode =
	(typeof CONVERSION_ERROR_CODES)[keyof typeof CONVERSION_ERROR_CODES];

/** Default message for each error code */
export const ERROR_MESSAGES: Record<ConversionErrorCode, string> = {
	UNABLE_TO_CONVERT_STRING_TO_NUMBER: "Unable to convert string to number",
	NOT_NUMERIC: "String is not a number in the given culture",
	NO_MATCH: "No numeric pattern matches the string",
	INVALID_FORMAT_SPECIFIER: "Invalid format specifier",
	UNABLE_TO_CONVERT_NUMBER_TO_STRING: "Unable to convert number to string",
	PATTERN_CULTURE_NOT_FOUND: "Unable to find pattern culture",
	INVALID_SEPARATORS: "Invalid thousand or decimal separator",
};

// ============================================================================
// Column Conversion
// ============================================================================

export interface ConversionIssue {
	/** Zero-based index of the cell in the column */
	row: number;
	value: string;
	code: ConversionErrorCode;
	message: string;
}

export interface ColumnConversionResult<T> {
	/** Converted values, `null` for empty or failed cells */
	values: (T | null)[];
	issues: ConversionIssue[];
	valid: boolean;
	/** True when conversion stopped at `maxIssues` */
	aborted: boolean;
}
