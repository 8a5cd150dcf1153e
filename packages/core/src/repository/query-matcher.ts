import {
	getNestedValue,
	hasNestedValue,
	isRecord,
	setNestedValue,
	unsetNestedValue,
} from "../utils/nested-path.js";
import type { Filter, Projection, SortSpec, StoredRecord, UpdateDocument } from "./document-store.js";

/**
 * Evaluation of MongoDB-style filters, updates, sorts and projections over
 * plain records. Backs the in-memory DocumentStore.
 *
 * @module
 */

// ============================================================================
// Values
// ============================================================================

const hasHexString = (value: object): value is { toHexString(): string } =>
	"toHexString" in value && typeof value.toHexString === "function";

export const valuesEqual = (a: unknown, b: unknown): boolean => {
	if (a === b) return true;
	if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
	if (typeof a === "object" && a !== null && typeof b === "object" && b !== null) {
		if (hasHexString(a) && hasHexString(b)) return a.toHexString() === b.toHexString();
		if (Array.isArray(a) && Array.isArray(b)) {
			return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
		}
	}
	return false;
};

const typeRank = (value: unknown): number => {
	if (value === null || value === undefined) return 0;
	if (typeof value === "number") return 1;
	if (typeof value === "string") return 2;
	if (typeof value === "boolean") return 4;
	if (value instanceof Date) return 5;
	return 3;
};

/**
 * Orders values the way the database does: missing and null first, then
 * numbers, strings, other objects, booleans and dates.
 */
export const compareValues = (a: unknown, b: unknown): number => {
	const rankA = typeRank(a);
	const rankB = typeRank(b);
	if (rankA !== rankB) return rankA - rankB;
	if (typeof a === "number" && typeof b === "number") return a - b;
	if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
	if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
	if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
	const textA = String(a);
	const textB = String(b);
	return textA < textB ? -1 : textA > textB ? 1 : 0;
};

export const cloneValue = (value: unknown): unknown => {
	if (Array.isArray(value)) return value.map(cloneValue);
	if (isRecord(value) && Object.getPrototypeOf(value) === Object.prototype) {
		return cloneRecord(value);
	}
	return value;
};

export const cloneRecord = (record: Readonly<Record<string, unknown>>): StoredRecord => {
	const copy: StoredRecord = {};
	for (const [key, value] of Object.entries(record)) {
		copy[key] = cloneValue(value);
	}
	return copy;
};

// ============================================================================
// Filters
// ============================================================================

const isOperatorObject = (value: unknown): value is Readonly<Record<string, unknown>> =>
	isRecord(value) &&
	Object.getPrototypeOf(value) === Object.prototype &&
	Object.keys(value).length > 0 &&
	Object.keys(value).every((key) => key.startsWith("$"));

const matchesScalar = (actual: unknown, expected: unknown): boolean => {
	// null matches a missing field as well
	if (expected === null) return actual === null || actual === undefined;
	return Array.isArray(actual) && !Array.isArray(expected)
		? actual.some((item) => valuesEqual(item, expected))
		: valuesEqual(actual, expected);
};

const toRegExp = (pattern: unknown, options: unknown): RegExp | null => {
	const flags = typeof options === "string" ? options.replace(/[^ims]/g, "") : "";
	if (pattern instanceof RegExp) return new RegExp(pattern.source, flags || pattern.flags);
	return typeof pattern === "string" ? new RegExp(pattern, flags) : null;
};

const comparable = (actual: unknown, operand: unknown): boolean =>
	actual !== null && actual !== undefined && typeRank(actual) === typeRank(operand);

const matchesOperators = (
	record: Readonly<Record<string, unknown>>,
	path: string,
	operators: Readonly<Record<string, unknown>>,
): boolean => {
	const actual = getNestedValue(record, path);
	return Object.entries(operators).every(([operator, operand]) => {
		switch (operator) {
			case "$eq":
				return matchesScalar(actual, operand);
			case "$ne":
				return !matchesScalar(actual, operand);
			case "$in":
				return Array.isArray(operand) && operand.some((item) => matchesScalar(actual, item));
			case "$nin":
				return !Array.isArray(operand) || !operand.some((item) => matchesScalar(actual, item));
			case "$gt":
				return comparable(actual, operand) && compareValues(actual, operand) > 0;
			case "$gte":
				return comparable(actual, operand) && compareValues(actual, operand) >= 0;
			case "$lt":
				return comparable(actual, operand) && compareValues(actual, operand) < 0;
			case "$lte":
				return comparable(actual, operand) && compareValues(actual, operand) <= 0;
			case "$exists":
				return hasNestedValue(record, path) === Boolean(operand);
			case "$regex": {
				const regexp = toRegExp(operand, operators.$options);
				return regexp !== null && typeof actual === "string" && regexp.test(actual);
			}
			case "$options":
				return true;
			case "$not":
				return isOperatorObject(operand) && !matchesOperators(record, path, operand);
			default:
				return false;
		}
	});
};

const isFilterList = (value: unknown): value is ReadonlyArray<Filter> =>
	Array.isArray(value) && value.every(isRecord);

export const matchesFilter = (record: Readonly<Record<string, unknown>>, filter: Filter): boolean =>
	Object.entries(filter).every(([key, condition]) => {
		switch (key) {
			case "$and":
				return isFilterList(condition) && condition.every((sub) => matchesFilter(record, sub));
			case "$or":
				return isFilterList(condition) && condition.some((sub) => matchesFilter(record, sub));
			case "$nor":
				return isFilterList(condition) && !condition.some((sub) => matchesFilter(record, sub));
			default:
				if (condition instanceof RegExp) {
					return matchesOperators(record, key, { $regex: condition });
				}
				return isOperatorObject(condition)
					? matchesOperators(record, key, condition)
					: matchesScalar(getNestedValue(record, key), condition);
		}
	});

// ============================================================================
// Updates
// ============================================================================

export const isOperatorUpdate = (update: UpdateDocument): boolean =>
	Object.keys(update).some((key) => key.startsWith("$"));

const entriesOf = (value: unknown): ReadonlyArray<[string, unknown]> =>
	isRecord(value) ? Object.entries(value) : [];

/**
 * Returns an updated copy of `record`. `$setOnInsert` only applies when
 * `inserting`. An update without operators replaces everything but `_id`.
 */
export const applyUpdate = (
	record: Readonly<Record<string, unknown>>,
	update: UpdateDocument,
	inserting: boolean,
): StoredRecord => {
	if (!isOperatorUpdate(update)) {
		return { ...cloneRecord(update), _id: record._id };
	}
	const next = cloneRecord(record);
	for (const [path, value] of entriesOf(update.$set)) {
		setNestedValue(next, path, cloneValue(value));
	}
	if (inserting) {
		for (const [path, value] of entriesOf(update.$setOnInsert)) {
			setNestedValue(next, path, cloneValue(value));
		}
	}
	for (const [path] of entriesOf(update.$unset)) {
		unsetNestedValue(next, path);
	}
	for (const [path, amount] of entriesOf(update.$inc)) {
		const current = getNestedValue(next, path);
		const base = typeof current === "number" ? current : 0;
		setNestedValue(next, path, base + (typeof amount === "number" ? amount : 0));
	}
	return next;
};

/**
 * Seed of an upserted record: the plain equality conditions of its filter.
 */
export const seedFromFilter = (filter: Filter): StoredRecord => {
	const seed: StoredRecord = {};
	for (const [key, condition] of Object.entries(filter)) {
		if (key.startsWith("$")) continue;
		if (isOperatorObject(condition)) {
			if ("$eq" in condition) setNestedValue(seed, key, cloneValue(condition.$eq));
			continue;
		}
		setNestedValue(seed, key, cloneValue(condition));
	}
	return seed;
};

// ============================================================================
// Sorting and projection
// ============================================================================

export const sortRecords = (
	records: ReadonlyArray<StoredRecord>,
	sort: SortSpec,
): ReadonlyArray<StoredRecord> => {
	if (sort.length === 0) return records;
	return [...records].sort((a, b) => {
		for (const [field, direction] of sort) {
			const order = compareValues(getNestedValue(a, field), getNestedValue(b, field));
			if (order !== 0) return order * direction;
		}
		return 0;
	});
};

/**
 * Inclusion projections keep `_id` unless it is explicitly excluded.
 */
export const applyProjection = (record: StoredRecord, projection: Projection): StoredRecord => {
	const entries = Object.entries(projection);
	if (entries.length === 0) return record;
	const inclusive = entries.some(([field, include]) => include && field !== "_id");
	if (!inclusive) {
		const copy = cloneRecord(record);
		for (const [field, include] of entries) {
			if (!include) unsetNestedValue(copy, field);
		}
		return copy;
	}
	const projected: StoredRecord = {};
	if (projection._id !== false && "_id" in record) projected._id = record._id;
	for (const [field, include] of entries) {
		if (include && hasNestedValue(record, field)) {
			setNestedValue(projected, field, cloneValue(getNestedValue(record, field)));
		}
	}
	return projected;
};
