import { type SeparatorSettings, type SettingsChoice, resolveSettings } from "../culture";
import { type ConversionResult, fail, ok } from "../errors";
import { type NumericTarget, normalizeLiteral, parse } from "../parser";
import { type PatternMatch, classify } from "../pattern";
import { CONVERSION_ERROR_CODES } from "../types";

// ============================================================================
// Numeric String Classifier
// ============================================================================

/**
 * A string bound to a culture or separator pair.
 * The string is classified on first query and the match is kept for the
 * lifetime of the instance.
 */
export class NumericString {
	readonly input: string;
	private readonly settings: ConversionResult<SeparatorSettings>;
	/** undefined until classified, null when nothing matched */
	private match: PatternMatch | null | undefined;

	constructor(input: string, choice?: SettingsChoice) {
		this.input = input;
		this.settings = resolveSettings(choice);
	}

	private classified(): PatternMatch | null {
		if (this.match === undefined) {
			this.match = this.settings.ok ? classify(this.input, this.settings.value) : null;
		}
		return this.match;
	}

	isNumeric(): boolean {
		return this.classified() !== null;
	}

	isInteger(): boolean {
		return this.classified()?.rule.kind === "integer";
	}

	isFloat(): boolean {
		return this.classified()?.rule.kind === "decimal";
	}

	/**
	 * Get the rule that matched the string.
	 */
	currentPattern(): ConversionResult<PatternMatch> {
		if (!this.settings.ok) return this.settings;

		const match = this.classified();
		if (!match) {
			return fail(
				CONVERSION_ERROR_CODES.NO_MATCH,
				`No numeric pattern matches ${JSON.stringify(this.input)}`
			);
		}
		return ok(match);
	}

	/**
	 * Canonical literal (`[-+]?digits(.digits)?`), or null if not numeric.
	 */
	canonicalLiteral(): string | null {
		const match = this.classified();
		if (!match || !this.settings.ok) return null;

		return normalizeLiteral(this.input, match.tag, this.settings.value);
	}

	/**
	 * Convert to the target type. Fails with NOT_NUMERIC when the string did
	 * not classify, without attempting a parse.
	 */
	toNumber<T extends number | bigint>(target: NumericTarget<T>): ConversionResult<T> {
		if (!this.settings.ok) return this.settings;

		const match = this.classified();
		if (!match) {
			return fail(
				CONVERSION_ERROR_CODES.NOT_NUMERIC,
				`${JSON.stringify(this.input)} is not a number in the given culture`
			);
		}

		return parse(this.input, match.tag, this.settings.value, target);
	}
}
