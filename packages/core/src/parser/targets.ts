// ============================================================================
// Numeric Target Capability
// ============================================================================

export type NumericTargetName =
	| "i8"
	| "i16"
	| "i32"
	| "i64"
	| "u8"
	| "u16"
	| "u32"
	| "u64"
	| "f32"
	| "f64";

/**
 * A native numeric type the parser can produce.
 * 64-bit integers are represented as bigint.
 */
export interface NumericTarget<T extends number | bigint> {
	readonly name: NumericTargetName;
	/** Integer targets reject fractional literals */
	readonly integer: boolean;
	readonly min: T;
	readonly max: T;
	/**
	 * Convert a canonical literal (`[-+]?digits(.digits)?`).
	 * Returns null on malformed input, fraction for an integer, or overflow.
	 */
	fromLiteral(literal: string): T | null;
}

const INTEGER_LITERAL = /^[-+]?[0-9]+$/;
const DECIMAL_LITERAL = /^[-+]?[0-9]+(?:\.[0-9]+)?$/;

/**
 * Parse an integer literal and check it lies in [min, max].
 */
function boundedBigInt(literal: string, min: bigint, max: bigint): bigint | null {
	if (!INTEGER_LITERAL.test(literal)) return null;

	const value = BigInt(literal.startsWith("+") ? literal.slice(1) : literal);
	if (value < min || value > max) return null;

	return value;
}

// ============================================================================
// Integer Targets
// ============================================================================

function smallIntegerTarget(
	name: NumericTargetName,
	min: number,
	max: number
): NumericTarget<number> {
	const minBig = BigInt(min);
	const maxBig = BigInt(max);

	return Object.freeze({
		name,
		integer: true,
		min,
		max,
		fromLiteral(literal: string): number | null {
			const value = boundedBigInt(literal, minBig, maxBig);
			return value === null ? null : Number(value);
		},
	});
}

function bigIntegerTarget(name: NumericTargetName, min: bigint, max: bigint): NumericTarget<bigint> {
	return Object.freeze({
		name,
		integer: true,
		min,
		max,
		fromLiteral(literal: string): bigint | null {
			return boundedBigInt(literal, min, max);
		},
	});
}

export const i8 = smallIntegerTarget("i8", -128, 127);
export const i16 = smallIntegerTarget("i16", -32_768, 32_767);
export const i32 = smallIntegerTarget("i32", -2_147_483_648, 2_147_483_647);
export const i64 = bigIntegerTarget("i64", -(2n ** 63n), 2n ** 63n - 1n);

export const u8 = smallIntegerTarget("u8", 0, 255);
export const u16 = smallIntegerTarget("u16", 0, 65_535);
export const u32 = smallIntegerTarget("u32", 0, 4_294_967_295);
export const u64 = bigIntegerTarget("u64", 0n, 2n ** 64n - 1n);

// ============================================================================
// Floating-Point Targets
// ============================================================================

/** Largest finite single-precision value */
const F32_MAX = 3.4028234663852886e38;

function floatTarget(
	name: NumericTargetName,
	max: number,
	round: (value: number) => number
): NumericTarget<number> {
	return Object.freeze({
		name,
		integer: false,
		min: -max,
		max,
		fromLiteral(literal: string): number | null {
			if (!DECIMAL_LITERAL.test(literal)) return null;

			// Overflow shows up as Infinity after rounding to the target width
			const value = round(Number(literal));
			return Number.isFinite(value) ? value : null;
		},
	});
}

export const f32 = floatTarget("f32", F32_MAX, Math.fround);
export const f64 = floatTarget("f64", Number.MAX_VALUE, (value) => value);

/**
 * All targets by name.
 */
export const NUMERIC_TARGETS = {
	i8,
	i16,
	i32,
	i64,
	u8,
	u16,
	u32,
	u64,
	f32,
	f64,
} as const;
