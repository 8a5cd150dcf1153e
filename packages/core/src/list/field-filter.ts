import { parseBool, parseDateToUnixTs, parseInteger, parseNumber, parseUuid } from "../validation/parsers.js";

// ============================================================================
// Filter declarations
// ============================================================================

export type FilterConverter = (value: unknown) => unknown;

/**
 * Filter on a differently named physical field, optionally converting the
 * value into a query condition.
 */
export interface FieldMapping {
	readonly _tag: "FieldMapping";
	readonly field: string;
	readonly convert?: FilterConverter;
}

/**
 * One input value matched against several physical fields; any of them may
 * match.
 */
export interface FieldSearch {
	readonly _tag: "FieldSearch";
	readonly fields: ReadonlyArray<string>;
	readonly convert: FilterConverter;
}

export type FieldType = "bool" | "int" | "float" | "date" | "uuid";

export interface FieldFilter {
	readonly mapping: string | FieldMapping | FieldSearch;
	readonly fieldType?: FieldType;
	readonly default?: unknown;
	/**
	 * Whether the filter may be set from the request query string.
	 */
	readonly fromQuery: boolean;
}

export const fieldMapping = (field: string, convert?: FilterConverter): FieldMapping => ({
	_tag: "FieldMapping",
	field,
	convert,
});

export const fieldSearch = (
	fields: ReadonlyArray<string>,
	convert: FilterConverter = (value) => value,
): FieldSearch => ({ _tag: "FieldSearch", fields, convert });

export const fieldFilter = (
	mapping: string | FieldMapping | FieldSearch,
	options: {
		readonly fieldType?: FieldType;
		readonly default?: unknown;
		readonly fromQuery?: boolean;
	} = {},
): FieldFilter => ({
	mapping,
	fieldType: options.fieldType,
	default: options.default,
	fromQuery: options.fromQuery ?? true,
});

// ============================================================================
// Coercion
// ============================================================================

const COERCIONS: { readonly [K in FieldType]: (value: unknown, fallback: unknown) => unknown } = {
	bool: parseBool,
	int: parseInteger,
	float: parseNumber,
	date: (value, fallback) => parseDateToUnixTs(value) ?? fallback,
	uuid: (value, fallback) => parseUuid(value) ?? fallback,
};

/**
 * Coerces a raw filter value by its declared type, falling back to the
 * declared default when the value cannot be parsed. Dates become epoch
 * seconds.
 */
export const coerceFilterValue = (filter: FieldFilter, value: unknown): unknown =>
	filter.fieldType === undefined ? value : COERCIONS[filter.fieldType](value, filter.default);
