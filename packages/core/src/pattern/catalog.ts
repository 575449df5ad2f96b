import type { SeparatorSettings } from "../culture";
import type { PatternMatch, PatternRule, ShapeKind, ShapeTag } from "./types";

// ============================================================================
// Rule Definitions
// ============================================================================

interface RuleShape {
	tag: ShapeTag;
	kind: ShapeKind;
	signed: boolean;
	grouped: boolean;
	/** Fraction only, no integer part (".5") */
	leadingOnly: boolean;
}

/** Rules in priority order, most specific first */
const RULE_SHAPES: readonly RuleShape[] = [
	{
		tag: "signed-thousand-decimal",
		kind: "decimal",
		signed: true,
		grouped: true,
		leadingOnly: false,
	},
	{
		tag: "thousand-decimal",
		kind: "decimal",
		signed: false,
		grouped: true,
		leadingOnly: false,
	},
	{
		tag: "signed-decimal",
		kind: "decimal",
		signed: true,
		grouped: false,
		leadingOnly: false,
	},
	{
		tag: "decimal",
		kind: "decimal",
		signed: false,
		grouped: false,
		leadingOnly: false,
	},
	{
		tag: "signed-decimal-leading-only",
		kind: "decimal",
		signed: true,
		grouped: false,
		leadingOnly: true,
	},
	{
		tag: "decimal-leading-only",
		kind: "decimal",
		signed: false,
		grouped: false,
		leadingOnly: true,
	},
	{
		tag: "signed-thousand-integer",
		kind: "integer",
		signed: true,
		grouped: true,
		leadingOnly: false,
	},
	{
		tag: "thousand-integer",
		kind: "integer",
		signed: false,
		grouped: true,
		leadingOnly: false,
	},
	{
		tag: "signed-integer",
		kind: "integer",
		signed: true,
		grouped: false,
		leadingOnly: false,
	},
	{
		tag: "plain-integer",
		kind: "integer",
		signed: false,
		grouped: false,
		leadingOnly: false,
	},
];

// ============================================================================
// Regex Construction
// ============================================================================

/**
 * Escape a separator for use inside a regex.
 */
export function escapeRegex(symbol: string): string {
	return symbol.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Regex source for a correctly grouped integer part (at least one separator).
 */
function groupedIntegerSource(settings: SeparatorSettings): string {
	const sep = escapeRegex(settings.thousandSeparator);

	if (settings.grouping === "indian") {
		// 12,34,567: 1-2 leading digits, pairs, then a final block of three
		return `[0-9]{1,2}(?:${sep}[0-9]{2})*${sep}[0-9]{3}`;
	}

	return `[0-9]{1,3}(?:${sep}[0-9]{3})+`;
}

function buildRule(shape: RuleShape, settings: SeparatorSettings): PatternRule {
	let source = shape.signed ? "[-+]" : "";

	if (!shape.leadingOnly) {
		source += shape.grouped ? groupedIntegerSource(settings) : "[0-9]+";
	}
	if (shape.kind === "decimal") {
		source += `${escapeRegex(settings.decimalSeparator)}[0-9]+`;
	}

	return {
		tag: shape.tag,
		kind: shape.kind,
		signed: shape.signed,
		leadingOnly: shape.leadingOnly,
		regex: new RegExp(`^${source}$`, "u"),
	};
}

// ============================================================================
// Catalog Cache
// ============================================================================

/** Cached catalogs beyond this count are evicted, oldest first */
export const MAX_CACHED_CATALOGS = 64;

const catalogCache = new Map<string, PatternRule[]>();

function cacheKey(settings: SeparatorSettings): string {
	return `${settings.thousandSeparator}\u0000${settings.decimalSeparator}\u0000${settings.grouping}`;
}

/**
 * Get the ordered rule list for a separator pair.
 * Grouped rules are left out when there is no thousand separator.
 */
export function getPatternCatalog(settings: SeparatorSettings): PatternRule[] {
	const key = cacheKey(settings);
	const cached = catalogCache.get(key);
	if (cached) return cached;

	const rules = RULE_SHAPES.filter(
		(shape) => !shape.grouped || settings.thousandSeparator !== ""
	).map((shape) => buildRule(shape, settings));

	if (catalogCache.size >= MAX_CACHED_CATALOGS) {
		const oldest = catalogCache.keys().next();
		if (!oldest.done) catalogCache.delete(oldest.value);
	}
	catalogCache.set(key, rules);
	return rules;
}

/**
 * Clear cached catalogs.
 */
export function clearPatternCache(): void {
	catalogCache.clear();
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Find the first rule matching the whole input.
 * Returns null if the string is not numeric for these settings.
 */
export function classify(input: string, settings: SeparatorSettings): PatternMatch | null {
	if (!input) return null;

	for (const rule of getPatternCatalog(settings)) {
		if (rule.regex.test(input)) {
			return { tag: rule.tag, rule };
		}
	}

	return null;
}
