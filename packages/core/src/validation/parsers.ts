import { ObjectId } from "bson";

/**
 * Lenient parsers shared by the validator units and the list query builder.
 *
 * Every parser returns `null` (or the given default) instead of throwing, so
 * callers can treat malformed input as "absent".
 *
 * @module
 */

// ============================================================================
// Patterns
// ============================================================================

export const PHONE_RE = /^\+?([0-9 ])+$/;
export const PHONE_9_RE = /^\+?([0-9 ]){9}$/;
export const TAG_RE = /(<!--[\s\S]*?-->|<[^>]*>)/g;

const UUID_RE =
	/^(?:urn:uuid:)?\{?([0-9a-f]{8})-?([0-9a-f]{4})-?([0-9a-f]{4})-?([0-9a-f]{4})-?([0-9a-f]{12})\}?$/i;
const OBJECT_ID_RE = /^[0-9a-f]{24}$/i;
const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const ISO_DATE_RE =
	/^(\d{4})-?(\d{2})(?:-?(\d{2}))?(?:[T ](\d{2})(?::?(\d{2})(?::?(\d{2})(?:[.,](\d+))?)?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const utf8 = new TextDecoder("utf-8");

const asText = (value: unknown): string | null => {
	if (typeof value === "string") return value;
	if (value instanceof Uint8Array) return utf8.decode(value);
	return null;
};

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Parses a UUID in any of the usual spellings (hyphenated or not, braces,
 * `urn:uuid:` prefix) into its canonical lower-case hyphenated form.
 */
export const parseUuid = (value: unknown): string | null => {
	const text = asText(value);
	if (text === null) return null;
	const match = UUID_RE.exec(text.trim());
	if (match === null) return null;
	return match.slice(1, 6).join("-").toLowerCase();
};

export const parseObjectId = (value: unknown): ObjectId | null => {
	if (value instanceof ObjectId) return value;
	const text = asText(value);
	if (text === null || !OBJECT_ID_RE.test(text)) return null;
	return ObjectId.createFromHexString(text);
};

// ============================================================================
// Scalars
// ============================================================================

export function parseBool(value: unknown): boolean | null;
export function parseBool<D>(value: unknown, fallback: D): boolean | D;
export function parseBool(value: unknown, fallback: unknown = null): unknown {
	if (typeof value === "boolean") return value;
	if (typeof value === "number") return value === 1;
	if (typeof value === "string") return value === "1" || value === "True" || value === "true";
	return fallback;
}

/**
 * Integer parsing: numbers are truncated, strings must hold a whole number.
 */
export function parseInteger(value: unknown): number | null;
export function parseInteger<D>(value: unknown, fallback: D): number | D;
export function parseInteger(value: unknown, fallback: unknown = null): unknown {
	if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : fallback;
	const text = asText(value);
	if (text === null) return fallback;
	const trimmed = text.trim();
	return INTEGER_RE.test(trimmed) ? Number.parseInt(trimmed, 10) : fallback;
}

export function parseNumber(value: unknown): number | null;
export function parseNumber<D>(value: unknown, fallback: D): number | D;
export function parseNumber(value: unknown, fallback: unknown = null): unknown {
	if (typeof value === "number") return Number.isFinite(value) ? value : fallback;
	const text = asText(value);
	if (text === null) return fallback;
	const trimmed = text.trim();
	return FLOAT_RE.test(trimmed) ? Number.parseFloat(trimmed) : fallback;
}

// ============================================================================
// Dates
// ============================================================================

/**
 * Parses an ISO-8601 date or date-time.
 *
 * With `removeOffset` the wall-clock time is kept and any offset is dropped;
 * otherwise the offset is applied. Values without an offset are read as UTC.
 */
export const parseDate = (value: unknown, removeOffset = false): Date | null => {
	if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
	const text = asText(value);
	if (text === null) return null;
	const match = ISO_DATE_RE.exec(text.trim());
	if (match === null) return null;

	const [, year, month, day, hour, minute, second, fraction, zone] = match;
	const y = Number(year);
	const mo = Number(month);
	const d = day === undefined ? 1 : Number(day);
	const h = hour === undefined ? 0 : Number(hour);
	const mi = minute === undefined ? 0 : Number(minute);
	const s = second === undefined ? 0 : Number(second);
	const ms = fraction === undefined ? 0 : Math.floor(Number(`0.${fraction}`) * 1000);

	if (mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59) return null;
	const wallClock = new Date(Date.UTC(y, mo - 1, d, h, mi, s, ms));
	// Date.UTC rolls 31 February over into March
	if (wallClock.getUTCDate() !== d || wallClock.getUTCFullYear() !== y) return null;

	if (removeOffset || zone === undefined || zone.toUpperCase() === "Z") return wallClock;
	const sign = zone.startsWith("-") ? -1 : 1;
	const digits = zone.slice(1).replace(":", "");
	const offsetMinutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2) || "0");
	return new Date(wallClock.getTime() - sign * offsetMinutes * 60_000);
};

/**
 * ISO-8601 text to whole seconds since the epoch, honouring any offset.
 */
export const parseDateToUnixTs = (value: unknown): number | null => {
	const date = parseDate(value);
	return date === null ? null : Math.floor(date.getTime() / 1000);
};

// ============================================================================
// Text
// ============================================================================

export const parsePhoneNumber = (value: unknown, nineDigits = false): string | null => {
	if (typeof value !== "string") return null;
	return (nineDigits ? PHONE_9_RE : PHONE_RE).test(value) ? value : null;
};

const ESCAPES: ReadonlyArray<readonly [string, string]> = [
	["&", "&amp;"],
	["<", "&lt;"],
	[">", "&gt;"],
	['"', "&quot;"],
	["'", "&#x27;"],
];

export const escapeHtml = (text: string): string =>
	ESCAPES.reduce((acc, [raw, entity]) => acc.replaceAll(raw, entity), text);

// &amp; is decoded last so "&amp;lt;" yields "&lt;" rather than "<"
export const unescapeHtml = (text: string): string =>
	[...ESCAPES].reverse().reduce((acc, [raw, entity]) => acc.replaceAll(entity, raw), text);

/**
 * Drops tags and comments, then escapes what is left. Already-escaped input
 * comes out unchanged.
 */
export const removeTags = (text: unknown): string => {
	if (typeof text !== "string" || text === "") return "";
	return escapeHtml(unescapeHtml(text.replace(TAG_RE, "")));
};
