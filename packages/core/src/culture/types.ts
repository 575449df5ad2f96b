// ============================================================================
// Separator Types
// ============================================================================

/**
 * A single separator symbol. The empty string means "no separator" and is
 * only accepted as a thousand separator.
 */
export type Separator = string;

/**
 * How integer digits are grouped.
 * - `three`: 1,000,000
 * - `indian`: 10,00,000 (last three digits, then pairs)
 */
export type ThousandGrouping = "three" | "indian";

/**
 * The separator pair used for one conversion.
 */
export interface SeparatorSettings {
	readonly thousandSeparator: Separator;
	readonly decimalSeparator: Separator;
	readonly grouping: ThousandGrouping;
}

// ============================================================================
// Culture Types
// ============================================================================

export type Culture = "en" | "fr" | "it" | "en-IN";

/**
 * Configuration for a built-in culture.
 */
export interface CultureConfig {
	/** Culture identifier (e.g., 'en', 'fr') */
	id: Culture;
	/** Display name */
	name: string;
	/** Other identifiers that resolve to this culture */
	aliases: string[];
	settings: SeparatorSettings;
}

/**
 * Either a named culture or explicit separators.
 */
export type SettingsChoice = Culture | SeparatorSettings;
