import { type ConversionResult, fail, ok } from "../errors";
import { CONVERSION_ERROR_CODES } from "../types";
import { validateSeparatorSettings } from "./separators";
import type { Culture, CultureConfig, SeparatorSettings, SettingsChoice } from "./types";

// ============================================================================
// Built-in Culture Configurations
// ============================================================================

const englishCulture: CultureConfig = {
	id: "en",
	name: "English",
	aliases: ["en-US", "en-GB"],

	// Number: 1,234.56
	settings: { thousandSeparator: ",", decimalSeparator: ".", grouping: "three" },
};

const frenchCulture: CultureConfig = {
	id: "fr",
	name: "French",
	aliases: ["fr-FR"],

	// Number: 1 234,56 (space as thousands separator)
	settings: { thousandSeparator: " ", decimalSeparator: ",", grouping: "three" },
};

const italianCulture: CultureConfig = {
	id: "it",
	name: "Italian",
	aliases: ["it-IT"],

	// Number: 1.234,56
	settings: { thousandSeparator: ".", decimalSeparator: ",", grouping: "three" },
};

const indianCulture: CultureConfig = {
	id: "en-IN",
	name: "Indian",
	aliases: ["hi", "hi-IN"],

	// Number: 12,34,567.89
	settings: { thousandSeparator: ",", decimalSeparator: ".", grouping: "indian" },
};

// ============================================================================
// Culture Table
// ============================================================================

const cultureTable: Readonly<Record<Culture, CultureConfig>> = Object.freeze({
	en: englishCulture,
	fr: frenchCulture,
	it: italianCulture,
	"en-IN": indianCulture,
});

for (const config of Object.values(cultureTable)) {
	Object.freeze(config.settings);
	Object.freeze(config.aliases);
	Object.freeze(config);
}

// Aliases resolve to the canonical culture id
const aliasTable = new Map<string, Culture>();
for (const config of Object.values(cultureTable)) {
	aliasTable.set(config.id.toLowerCase(), config.id);
	for (const alias of config.aliases) {
		aliasTable.set(alias.toLowerCase(), config.id);
	}
}

export const DEFAULT_CULTURE: Culture = "en";

/**
 * Check if a string is a canonical culture id.
 */
export function isCulture(id: string): id is Culture {
	return Object.prototype.hasOwnProperty.call(cultureTable, id);
}

/**
 * Get all canonical culture ids.
 */
export function getCultureIds(): Culture[] {
	return Object.values(cultureTable).map((config) => config.id);
}

export function getCultureConfig(culture: Culture): CultureConfig {
	return cultureTable[culture];
}

export function getCultureSettings(culture: Culture): SeparatorSettings {
	return cultureTable[culture].settings;
}

/**
 * Resolve a culture id or alias (case-insensitive).
 */
export function parseCulture(id: string): ConversionResult<Culture> {
	const culture = aliasTable.get(id.trim().toLowerCase());
	if (culture === undefined) {
		return fail(
			CONVERSION_ERROR_CODES.PATTERN_CULTURE_NOT_FOUND,
			`Unable to find pattern culture ${JSON.stringify(id)}`
		);
	}
	return ok(culture);
}

/**
 * Turn a culture, explicit settings, or nothing (default culture) into the
 * settings for one conversion. Explicit settings are validated.
 */
export function resolveSettings(choice?: SettingsChoice): ConversionResult<SeparatorSettings> {
	if (choice === undefined) {
		return ok(getCultureSettings(DEFAULT_CULTURE));
	}
	if (typeof choice === "string") {
		// Untyped callers can still pass an arbitrary string
		if (!isCulture(choice)) {
			return fail(CONVERSION_ERROR_CODES.PATTERN_CULTURE_NOT_FOUND);
		}
		return ok(getCultureSettings(choice));
	}
	return validateSeparatorSettings(choice);
}
