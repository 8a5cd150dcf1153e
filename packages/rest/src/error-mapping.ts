/**
 * Error-to-HTTP-response mapping.
 *
 * Known failures get their status and application error code; anything
 * else becomes a 500 with UNDEFINED_ERROR. Failures thrown by
 * `Effect.runPromise` arrive wrapped in a FiberFailure and are unwrapped
 * first.
 *
 * @module
 */

import { NotFoundError, StorageError, ValidationFailedError } from "@restdoc/core";
import { Cause, Runtime } from "effect";
import { type ErrorEntry, ErrorCodes } from "./error-codes.js";
import { HttpError } from "./http-error.js";

// ============================================================================
// Types
// ============================================================================

export interface ErrorBody {
	readonly status: "ERROR";
	readonly error_code: number;
	readonly message: string;
	readonly details?: unknown;
}

export interface ErrorResponse {
	readonly status: number;
	readonly body: ErrorBody;
}

// ============================================================================
// Mapping
// ============================================================================

const unwrap = (error: unknown): unknown =>
	Runtime.isFiberFailure(error) ? Cause.squash(error[Runtime.FiberFailureCauseId]) : error;

const respond = (status: number, code: number, message: string, details?: unknown): ErrorResponse => ({
	status,
	body:
		details === undefined || details === null || details === ""
			? { status: "ERROR", error_code: code, message }
			: { status: "ERROR", error_code: code, message, details },
});

const fromEntry = (status: number, entry: ErrorEntry, details?: unknown): ErrorResponse =>
	respond(status, entry.code, entry.message, details);

/**
 * @example
 * ```ts
 * mapErrorToResponse(new NotFoundError({ collection: "users", id: "u1", message: "..." }))
 * // { status: 404, body: { status: "ERROR", error_code: 4000, message: "Endpoint does not exists" } }
 * ```
 */
export const mapErrorToResponse = (error: unknown): ErrorResponse => {
	const failure = unwrap(error);

	if (failure instanceof HttpError) {
		return respond(failure.status, failure.code, failure.message, failure.details);
	}
	if (failure instanceof ValidationFailedError) {
		return fromEntry(400, ErrorCodes.VALIDATION_ERROR, failure.errors);
	}
	if (failure instanceof NotFoundError) {
		return fromEntry(404, ErrorCodes.GENERAL_NOT_FOUND);
	}
	if (failure instanceof StorageError) {
		return fromEntry(500, ErrorCodes.STORE_TO_DATABASE);
	}
	return fromEntry(500, ErrorCodes.UNDEFINED_ERROR, failure instanceof Error ? failure.name : undefined);
};
