import type { ObjectId } from "bson";
import { ErrorCode } from "./error-codes.js";
import { failure, type Outcome, success } from "./outcome.js";
import {
	parseBool,
	parseDate,
	parseInteger,
	parseNumber,
	parseObjectId,
	parsePhoneNumber,
	parseUuid,
	removeTags,
} from "./parsers.js";

// ============================================================================
// Validator units
// ============================================================================
//
// Each unit is a pure `(value, options) => Outcome`. A `null` or `undefined`
// value is accepted as `null` by everything except `isRequired`, so optional
// fields need no special casing in a chain.

const EMAIL_RE = /^[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+$/;

const isAbsent = (value: unknown): value is null | undefined =>
	value === null || value === undefined;

export const isRequired = (value: unknown): Outcome => {
	if (isAbsent(value) || value === "") {
		return failure(ErrorCode.REQUIRED, "Missing required value");
	}
	return success(value);
};

// ============================================================================
// Strings
// ============================================================================

export interface StringOptions {
	readonly minLen?: number;
	readonly maxLen?: number;
	readonly endsWith?: string;
	readonly startsWith?: string;
	readonly stripHtml?: boolean;
}

export const validateString = (value: unknown, options: StringOptions = {}): Outcome<string | null> => {
	if (isAbsent(value)) return success(null);
	if (typeof value !== "string") {
		return failure(ErrorCode.STR_NOT_STRING, "Value not a string");
	}
	const { minLen, maxLen, endsWith, startsWith, stripHtml = false } = options;
	// lengths are in code points
	const length = [...value].length;
	if (minLen && length < minLen) {
		return failure(ErrorCode.STR_TOO_SHORT, `Value is too short. Min length ${minLen}`);
	}
	if (maxLen && length > maxLen) {
		return failure(ErrorCode.STR_TOO_LONG, `Value is too long. Max length ${maxLen}`);
	}
	if (endsWith && !value.endsWith(endsWith)) {
		return failure(
			ErrorCode.STR_NOT_ENDS_WITH,
			`Incorrect value. Value not ends with ${endsWith}`,
		);
	}
	if (startsWith && !value.startsWith(startsWith)) {
		return failure(
			ErrorCode.STR_NOT_STARTS_WITH,
			`Incorrect value. Value not starts with ${startsWith}`,
		);
	}
	return success(stripHtml ? removeTags(value) : value);
};

export const validateEmail = (value: unknown, domain?: string): Outcome<string | null> => {
	if (isAbsent(value)) return success(null);
	if (typeof value !== "string" || !EMAIL_RE.test(value)) {
		return failure(ErrorCode.EMAIL_NOT_VALID, "Not valid email address");
	}
	if (domain && !value.endsWith(domain)) {
		return failure(ErrorCode.EMAIL_DOMAIN, "Not valid domain");
	}
	return success(value);
};

/**
 * Phone numbers are digits and spaces with an optional leading `+`. For
 * Poland (`"POL"`) exactly nine such characters are required.
 */
export const validatePhone = (value: unknown, country?: string): Outcome<string | null> => {
	if (isAbsent(value)) return success(null);
	const phone = parsePhoneNumber(value, country === "POL");
	if (phone === null) {
		return failure(ErrorCode.PHONE_FORMAT, "Invalid phone format");
	}
	return success(phone);
};

// ============================================================================
// Dates and numbers
// ============================================================================

export interface DateOptions {
	readonly removeOffset?: boolean;
	readonly before?: Date;
	readonly after?: Date;
}

export const validateDate = (value: unknown, options: DateOptions = {}): Outcome<Date | null> => {
	if (isAbsent(value)) return success(null);
	const { removeOffset = true, before, after } = options;
	const date = parseDate(value, removeOffset);
	if (date === null) {
		return failure(ErrorCode.DATE_FORMAT, "Not valid date format");
	}
	if (before && before.getTime() < date.getTime()) {
		return failure(ErrorCode.DATE_BEFORE, `Date has to be before ${before.toISOString()}`);
	}
	if (after && after.getTime() > date.getTime()) {
		return failure(ErrorCode.DATE_AFTER, `Date has to be after ${after.toISOString()}`);
	}
	return success(date);
};

export interface NumberOptions {
	readonly integer?: boolean;
	readonly min?: number;
	readonly max?: number;
}

export const validateNumber = (value: unknown, options: NumberOptions = {}): Outcome<number | null> => {
	if (isAbsent(value)) return success(null);
	const { integer = false, min, max } = options;
	const parsed = integer ? parseInteger(value) : parseNumber(value);
	if (parsed === null) {
		return failure(ErrorCode.NUMBER_FORMAT, "Invalid number format");
	}
	if (min !== undefined && parsed < min) {
		return failure(ErrorCode.NUMBER_TOO_SMALL, `Cannot be smaller than ${min}`);
	}
	if (max !== undefined && parsed > max) {
		return failure(ErrorCode.NUMBER_TOO_BIG, `Cannot be bigger than ${max}`);
	}
	return success(parsed);
};

// ============================================================================
// Coercion
// ============================================================================

export type CoercionKind = "uuid" | "objectId" | "boolean";

const COERCIONS: { readonly [K in CoercionKind]: (value: unknown) => unknown } = {
	uuid: parseUuid,
	objectId: parseObjectId,
	boolean: (value) => parseBool(value),
};

export const validateCoercion = (value: unknown, kind: CoercionKind): Outcome => {
	if (isAbsent(value)) return success(null);
	const coerced = COERCIONS[kind](value);
	if (isAbsent(coerced)) {
		return failure(ErrorCode.INVALID_VALUE, "Incorrect value");
	}
	return success(coerced);
};

// ============================================================================
// Lists and enumerations
// ============================================================================

export type ListItem =
	| { readonly kind: "uuid" }
	| { readonly kind: "objectId" }
	| { readonly kind: "number"; readonly integer: boolean }
	| { readonly kind: "date" }
	| { readonly kind: "stringIn"; readonly available: ReadonlyArray<string> };

export type ListItemValue = string | number | Date | ObjectId;

export interface ListOptions {
	readonly minLength?: number;
	readonly maxLength?: number;
}

const parseListItem = (item: ListItem, value: unknown): ListItemValue | null => {
	switch (item.kind) {
		case "uuid":
			return parseUuid(value);
		case "objectId":
			return parseObjectId(value);
		case "number":
			return item.integer ? parseInteger(value) : parseNumber(value);
		case "date":
			return parseDate(value);
		case "stringIn":
			return typeof value === "string" && item.available.includes(value) ? value : null;
	}
};

export const validateList = (
	value: unknown,
	item: ListItem,
	options: ListOptions = {},
): Outcome<ReadonlyArray<ListItemValue> | null> => {
	if (isAbsent(value)) return success(null);
	if (!Array.isArray(value)) {
		return failure(ErrorCode.EXPECTED_LIST, "Expected list");
	}
	const { minLength, maxLength } = options;
	if (minLength && value.length < minLength) {
		return failure(
			ErrorCode.LIST_TOO_SHORT,
			`List too short. Required at least ${minLength} elements`,
		);
	}
	const parsed: Array<ListItemValue> = [];
	for (const [position, element] of value.entries()) {
		const next = parseListItem(item, element);
		if (next === null) {
			return failure(ErrorCode.LIST_VALUE_ERROR, `Invalid value at position ${position}`);
		}
		parsed.push(next);
	}
	if (maxLength && parsed.length > maxLength) {
		return failure(
			ErrorCode.LIST_TOO_BIG,
			`List too long. Expected maximum ${maxLength} elements`,
		);
	}
	return success(parsed);
};

export const validateValueIn = (value: unknown, available: ReadonlyArray<unknown>): Outcome => {
	if (isAbsent(value)) return success(null);
	if (available.includes(value)) return success(value);
	return failure(
		ErrorCode.VALUE_IN,
		`Incorrect value. Expected ${available.map(String).join(", ")}`,
	);
};

// ============================================================================
// Test helpers
// ============================================================================

export const justFail = (_value: unknown): Outcome<never> => failure(ErrorCode.JUST_FAIL, "Fail");

export const justPass = (_value: unknown): Outcome<null> => success(null);
