// Targets
export {
	NUMERIC_TARGETS,
	f32,
	f64,
	i8,
	i16,
	i32,
	i64,
	u8,
	u16,
	u32,
	u64,
} from "./targets";
export type { NumericTarget, NumericTargetName } from "./targets";

// Parsing
export { normalizeLiteral, parse } from "./parse";
