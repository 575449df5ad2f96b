import { type ConversionErrorCode, ERROR_MESSAGES } from "./types";

// ============================================================================
// Conversion Error
// ============================================================================

/**
 * Error value carried by every failed conversion.
 */
export class ConversionError extends Error {
	readonly code: ConversionErrorCode;

	constructor(code: ConversionErrorCode, message?: string) {
		super(message ?? ERROR_MESSAGES[code]);
		this.name = "ConversionError";
		this.code = code;
	}
}

// ============================================================================
// Result Type
// ============================================================================

export type ConversionResult<T> =
	| { ok: true; value: T }
	| { ok: false; error: ConversionError };

export function ok<T>(value: T): ConversionResult<T> {
	return { ok: true, value };
}

export function fail<T>(code: ConversionErrorCode, message?: string): ConversionResult<T> {
	return { ok: false, error: new ConversionError(code, message) };
}

/**
 * Return the value of a successful result, or throw its error.
 */
export function unwrap<T>(result: ConversionResult<T>): T {
	if (!result.ok) {
		throw result.error;
	}
	return result.value;
}
