import type { ThousandGrouping } from "../culture";

// ============================================================================
// Decimal Expansion
// ============================================================================

/**
 * A number split into sign and decimal digit strings.
 */
export interface DecimalParts {
	negative: boolean;
	/** Integer digits without leading zeros ("0" for zero) */
	integer: string;
	fraction: string;
}

const NUMBER_STRING = /^([0-9]+)(?:\.([0-9]+))?(?:e([+-][0-9]+))?$/;

function stripLeadingZeros(digits: string): string {
	const stripped = digits.replace(/^0+/, "");
	return stripped === "" ? "0" : stripped;
}

/**
 * Exact shortest decimal expansion of a value.
 * Exponent notation is expanded to plain digits. Returns null for NaN and
 * infinities.
 */
export function toDecimalParts(value: number | bigint): DecimalParts | null {
	if (typeof value === "bigint") {
		const negative = value < 0n;
		return { negative, integer: (negative ? -value : value).toString(), fraction: "" };
	}

	if (!Number.isFinite(value)) return null;

	const match = NUMBER_STRING.exec(String(Math.abs(value)));
	if (!match) return null;

	const whole = match[1];
	const fractional = match[2] ?? "";
	const exponent = match[3] ? Number.parseInt(match[3], 10) : 0;

	const digits = whole + fractional;
	const point = whole.length + exponent;

	let integer: string;
	let fraction: string;

	if (point <= 0) {
		integer = "0";
		fraction = "0".repeat(-point) + digits;
	} else if (point >= digits.length) {
		integer = digits + "0".repeat(point - digits.length);
		fraction = "";
	} else {
		integer = digits.slice(0, point);
		fraction = digits.slice(point);
	}

	return { negative: value < 0, integer: stripLeadingZeros(integer), fraction };
}

// ============================================================================
// Rounding
// ============================================================================

/**
 * Add one to a string of decimal digits.
 */
function incrementDigits(digits: string): string {
	const chars = digits.split("");

	for (let i = chars.length - 1; i >= 0; i--) {
		if (chars[i] === "9") {
			chars[i] = "0";
		} else {
			chars[i] = String(Number(chars[i]) + 1);
			return chars.join("");
		}
	}

	return `1${chars.join("")}`;
}

/**
 * Round to a fixed number of fractional digits, half away from zero.
 * The fraction of the result is always exactly `digits` long.
 */
export function roundDecimal(parts: DecimalParts, digits: number): DecimalParts {
	const { negative, integer, fraction } = parts;

	if (fraction.length <= digits) {
		return { negative, integer, fraction: fraction.padEnd(digits, "0") };
	}

	const kept = fraction.slice(0, digits);
	if (fraction[digits] < "5") {
		return { negative, integer, fraction: kept };
	}

	// Carry may run through the fraction into the integer part
	const rounded = incrementDigits(integer + kept);
	const split = rounded.length - digits;

	return {
		negative,
		integer: stripLeadingZeros(rounded.slice(0, split)),
		fraction: rounded.slice(split),
	};
}

export function isZero(parts: DecimalParts): boolean {
	return /^0*$/.test(parts.integer) && /^0*$/.test(parts.fraction);
}

// ============================================================================
// Grouping
// ============================================================================

/**
 * Insert the thousand separator into integer digits.
 */
export function groupDigits(digits: string, separator: string, grouping: ThousandGrouping): string {
	if (!separator || digits.length <= 3) return digits;

	const head = digits.slice(0, -3);
	const tail = digits.slice(-3);
	const size = grouping === "indian" ? 2 : 3;

	const groups: string[] = [];
	for (let end = head.length; end > 0; end -= size) {
		groups.unshift(head.slice(Math.max(0, end - size), end));
	}
	groups.push(tail);

	return groups.join(separator);
}
