import type { Outcome } from "./outcome.js";
import type { ValidatorSpec } from "./val.js";

// ============================================================================
// Schema types
// ============================================================================

/**
 * A hand-written validator. It receives the value produced by the previous
 * link of the chain and must return an Outcome.
 */
export type ValidatorFn = (value: unknown) => Outcome<unknown>;

export type ValidatorLike = ValidatorSpec | ValidatorFn;

/**
 * Marks a schema key as required: an absent value fails with REQUIRED before
 * the chain runs.
 */
export interface RequiredField {
	readonly _tag: "RequiredField";
	readonly name: string;
}

export type FieldKey = string | RequiredField;

export interface FieldRule {
	readonly key: FieldKey;
	readonly chain: ReadonlyArray<ValidatorLike>;
}

export type ValidationSchema = ReadonlyArray<FieldRule>;

export const requiredField = (name: string): RequiredField => ({ _tag: "RequiredField", name });

export const fieldName = (key: FieldKey): string => (typeof key === "string" ? key : key.name);

export const isRequiredKey = (key: FieldKey): key is RequiredField => typeof key !== "string";

export const rule = (key: FieldKey, ...chain: ReadonlyArray<ValidatorLike>): FieldRule => ({
	key,
	chain,
});

/**
 * Builds a schema from a record of chains (every key optional) or from rules,
 * which can carry `requiredField` keys. Field order is preserved.
 */
export const defineSchema = (
	fields: Readonly<Record<string, ReadonlyArray<ValidatorLike>>> | ReadonlyArray<FieldRule>,
): ValidationSchema =>
	Object.freeze(
		isRuleList(fields)
			? [...fields]
			: Object.entries(fields).map(([key, chain]) => ({ key, chain })),
	);

const isRuleList = (
	fields: Readonly<Record<string, ReadonlyArray<ValidatorLike>>> | ReadonlyArray<FieldRule>,
): fields is ReadonlyArray<FieldRule> => Array.isArray(fields);
