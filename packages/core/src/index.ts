// @numeric-culture/core - locale-aware string/number conversion

// Public conversion API
export { toFormat, toFormatSeparators, toNumber, toNumberCulture, toNumberSeparators } from "./conversion";
export { convertColumn } from "./column";
export type { ConvertColumnOptions } from "./column";

// Classifier
export { NumericString } from "./classifier";

// Culture exports
export {
	DEFAULT_CULTURE,
	SEPARATORS,
	createSeparatorSettings,
	customSeparator,
	getCultureConfig,
	getCultureIds,
	getCultureSettings,
	isCulture,
	parseCulture,
	resolveSettings,
	validateSeparatorSettings,
} from "./culture";
export type {
	Culture,
	CultureConfig,
	Separator,
	SeparatorSettings,
	SettingsChoice,
	ThousandGrouping,
} from "./culture";

// Pattern exports
export { MAX_CACHED_CATALOGS, classify, clearPatternCache, getPatternCatalog } from "./pattern";
export type { PatternMatch, PatternRule, ShapeKind, ShapeTag } from "./pattern";

// Parser exports
export {
	NUMERIC_TARGETS,
	f32,
	f64,
	i8,
	i16,
	i32,
	i64,
	normalizeLiteral,
	parse,
	u8,
	u16,
	u32,
	u64,
} from "./parser";
export type { NumericTarget, NumericTargetName } from "./parser";

// Formatter exports
export { MAX_FRACTION_DIGITS, format, parseFormatSpecifier } from "./format";

// Errors
export { ConversionError, fail, ok, unwrap } from "./errors";
export type { ConversionResult } from "./errors";

// Type exports
export * from "./types";
