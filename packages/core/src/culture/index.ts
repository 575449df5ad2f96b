// Types
export type {
	Culture,
	CultureConfig,
	Separator,
	SeparatorSettings,
	SettingsChoice,
	ThousandGrouping,
} from "./types";

// Separators
export {
	SEPARATORS,
	customSeparator,
	createSeparatorSettings,
	validateSeparatorSettings,
} from "./separators";

// Registry
export {
	DEFAULT_CULTURE,
	isCulture,
	getCultureIds,
	getCultureConfig,
	getCultureSettings,
	parseCulture,
	resolveSettings,
} from "./registry";
