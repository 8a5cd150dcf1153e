import { Data } from "effect";
import { type ErrorEntry, ErrorCodes } from "./error-codes.js";

/**
 * An error with a known HTTP status and application error code, rendered to
 * the client as is.
 */
export class HttpError extends Data.TaggedError("HttpError")<{
	readonly status: number;
	readonly code: number;
	readonly message: string;
	readonly details?: unknown;
}> {}

export const httpError = (status: number, entry: ErrorEntry, details?: unknown): HttpError =>
	new HttpError({ status, code: entry.code, message: entry.message, details });

export const badRequest = (entry: ErrorEntry, details?: unknown) => httpError(400, entry, details);
export const unauthorized = (entry: ErrorEntry, details?: unknown) => httpError(401, entry, details);
export const forbidden = (entry: ErrorEntry, details?: unknown) => httpError(403, entry, details);
export const notFound = (entry: ErrorEntry, details?: unknown) => httpError(404, entry, details);
export const methodNotAllowed = (entry: ErrorEntry, details?: unknown) => httpError(405, entry, details);
export const notAcceptable = (entry: ErrorEntry, details?: unknown) => httpError(406, entry, details);
export const conflict = (entry: ErrorEntry, details?: unknown) => httpError(409, entry, details);

export const internalError = (details?: unknown) => httpError(500, ErrorCodes.UNDEFINED_ERROR, details);
export const notImplemented = (details?: unknown) => httpError(501, ErrorCodes.METHOD_NOT_IMPLEMENTED, details);
