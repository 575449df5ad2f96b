// ============================================================================
// Shape Tags
// ============================================================================

/**
 * Structural shape of a numeric string, independent of its value.
 * "signed" shapes start with `+` or `-`.
 */
export type ShapeTag =
	| "signed-thousand-decimal"
	| "thousand-decimal"
	| "signed-decimal"
	| "decimal"
	| "signed-decimal-leading-only"
	| "decimal-leading-only"
	| "signed-thousand-integer"
	| "thousand-integer"
	| "signed-integer"
	| "plain-integer";

export type ShapeKind = "integer" | "decimal";

// ============================================================================
// Pattern Rules
// ============================================================================

/**
 * One classification rule, built for a specific separator pair.
 */
export interface PatternRule {
	tag: ShapeTag;
	kind: ShapeKind;
	signed: boolean;
	/** Has no integer digits before the decimal separator (e.g. ",10") */
	leadingOnly: boolean;
	/** Anchored matcher for the whole input */
	regex: RegExp;
}

export interface PatternMatch {
	tag: ShapeTag;
	rule: PatternRule;
}
