// Types
export type { PatternMatch, PatternRule, ShapeKind, ShapeTag } from "./types";

// Catalog
export {
	MAX_CACHED_CATALOGS,
	classify,
	clearPatternCache,
	escapeRegex,
	getPatternCatalog,
} from "./catalog";
