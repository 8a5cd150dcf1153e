import { isRecord, parseUuid, type RawQuery, type ValidationSchema, validateEffect, ValueObject } from "@restdoc/core";
import { Effect } from "effect";
import { ErrorCodes } from "./error-codes.js";
import { badRequest, type HttpError, notAcceptable } from "./http-error.js";

const utf8 = new TextDecoder("utf-8");

/**
 * Query parameters as frameworks hand them over: one value or several.
 */
export type RequestQuery = Readonly<Record<string, string | ReadonlyArray<string> | undefined>>;

/**
 * Parses a JSON request body. An empty or missing body is `{}`.
 */
export const parseJsonBody = (raw: string | Uint8Array | null | undefined): Effect.Effect<unknown, HttpError> =>
	Effect.suspend(() => {
		if (raw === null || raw === undefined || raw.length === 0) return Effect.succeed({});
		const text = typeof raw === "string" ? raw : utf8.decode(raw);
		return Effect.try({
			try: (): unknown => JSON.parse(text),
			catch: () => badRequest(ErrorCodes.INVALID_CONTENT),
		});
	});

/**
 * Write methods only accept JSON bodies.
 */
export const requireJsonContent = (
	method: string,
	contentType: string | undefined,
): Effect.Effect<void, HttpError> =>
	["POST", "PUT", "PATCH"].includes(method.toUpperCase()) && !(contentType ?? "").includes("application/json")
		? Effect.fail(notAcceptable(ErrorCodes.INVALID_CONTENT))
		: Effect.void;

/**
 * Validates a request body, failing with a 400 carrying the field errors.
 * A body that is not a JSON object is rejected as invalid content.
 */
export const validateBody = (
	body: unknown,
	schema: ValidationSchema,
): Effect.Effect<Readonly<Record<string, unknown>>, HttpError> =>
	body instanceof ValueObject || isRecord(body)
		? validateEffect(body, schema).pipe(
				Effect.mapError((error) => badRequest(ErrorCodes.VALIDATION_ERROR, error.errors)),
			)
		: Effect.fail(badRequest(ErrorCodes.INVALID_CONTENT));

export const tryParseUuid = (value: unknown): Effect.Effect<string, HttpError> => {
	const uuid = parseUuid(value);
	return uuid === null ? Effect.fail(badRequest(ErrorCodes.BAD_UUID)) : Effect.succeed(uuid);
};

export const toRawQuery = (query: RequestQuery): RawQuery => {
	const raw: Record<string, ReadonlyArray<string>> = {};
	for (const [name, value] of Object.entries(query)) {
		if (value === undefined) continue;
		raw[name] = typeof value === "string" ? [value] : value;
	}
	return raw;
};

/**
 * Last value of a query parameter.
 */
export const queryParam = (query: RequestQuery, name: string): string | undefined => {
	const value = query[name];
	if (value === undefined || typeof value === "string") return value;
	return value[value.length - 1];
};
