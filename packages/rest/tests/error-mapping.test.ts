/**
 * Tests for REST error mapping: status codes, application error codes and
 * FiberFailure unwrapping.
 */

import { NotFoundError, StorageError, ValidationFailedError } from "@restdoc/core";
import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { ErrorCodes } from "../src/error-codes.js";
import { mapErrorToResponse } from "../src/error-mapping.js";
import {
	badRequest,
	conflict,
	forbidden,
	HttpError,
	internalError,
	methodNotAllowed,
	notFound,
	notImplemented,
	unauthorized,
} from "../src/http-error.js";

// ============================================================================
// Status helpers
// ============================================================================

describe("HttpError status helpers", () => {
	it("pair each status with its error entry", () => {
		const rendered = [
			unauthorized(ErrorCodes.REQUIRES_AUTHORIZATION),
			forbidden(ErrorCodes.CANNOT_PERFORM_THIS_ACTION),
			methodNotAllowed(ErrorCodes.METHOD_NOT_SUPPORTED),
			conflict(ErrorCodes.EMAIL_REGISTERED, { email: "taken" }),
			notImplemented(),
		].map((error) => mapErrorToResponse(error));

		expect(rendered).toEqual([
			{ status: 401, body: { status: "ERROR", error_code: 4006, message: "Authorization required" } },
			{ status: 403, body: { status: "ERROR", error_code: 4003, message: "Cannot perform this action" } },
			{ status: 405, body: { status: "ERROR", error_code: 4002, message: "Method not supported" } },
			{
				status: 409,
				body: {
					status: "ERROR",
					error_code: 4011,
					message: "Email address already taken",
					details: { email: "taken" },
				},
			},
			{ status: 501, body: { status: "ERROR", error_code: 4001, message: "Method not implemented yet" } },
		]);
	});
});

// ============================================================================
// Known failures
// ============================================================================

describe("mapErrorToResponse — known failures", () => {
	it("renders an HttpError with its own status, code and details", () => {
		const response = mapErrorToResponse(notFound(ErrorCodes.GENERAL_NOT_FOUND, { path: "/missing" }));

		expect(response).toEqual({
			status: 404,
			body: {
				status: "ERROR",
				error_code: 4000,
				message: "Endpoint does not exists",
				details: { path: "/missing" },
			},
		});
	});

	it("leaves details out when an HttpError has none", () => {
		const response = mapErrorToResponse(badRequest(ErrorCodes.BAD_UUID));

		expect(response.status).toBe(400);
		expect(response.body).toEqual({ status: "ERROR", error_code: 4009, message: "Badly formed uuid" });
		expect("details" in response.body).toBe(false);
	});

	it("keeps a custom HttpError message", () => {
		const error = new HttpError({ status: 409, code: 4011, message: "Taken" });

		expect(mapErrorToResponse(error)).toEqual({
			status: 409,
			body: { status: "ERROR", error_code: 4011, message: "Taken" },
		});
	});

	it("maps ValidationFailedError to 400 with the field errors", () => {
		const errors = { name: { code: 11, message: "Value is too short. Min length 2" } };
		const error = new ValidationFailedError({ errors, message: "Validation failed for name" });

		expect(mapErrorToResponse(error)).toEqual({
			status: 400,
			body: {
				status: "ERROR",
				error_code: 4008,
				message: "Request validation error",
				details: errors,
			},
		});
	});

	it("maps NotFoundError to 404", () => {
		const error = new NotFoundError({ collection: "users", id: "u1", message: "Record u1 not found in users" });

		expect(mapErrorToResponse(error)).toEqual({
			status: 404,
			body: { status: "ERROR", error_code: 4000, message: "Endpoint does not exists" },
		});
	});

	it("maps StorageError to 500 STORE_TO_DATABASE", () => {
		const error = new StorageError({ collection: "users", operation: "insert", message: "write failed" });

		expect(mapErrorToResponse(error)).toEqual({
			status: 500,
			body: { status: "ERROR", error_code: 4012, message: "Error storing result in database" },
		});
	});

	it("maps internalError to 500 UNDEFINED_ERROR", () => {
		expect(mapErrorToResponse(internalError()).body.error_code).toBe(4005);
	});
});

// ============================================================================
// Unknown failures
// ============================================================================

describe("mapErrorToResponse — unknown failures", () => {
	it("maps a plain Error to 500 with its name as details", () => {
		expect(mapErrorToResponse(new TypeError("boom"))).toEqual({
			status: 500,
			body: {
				status: "ERROR",
				error_code: 4005,
				message: "An unexpected error has occurred",
				details: "TypeError",
			},
		});
	});

	it("maps a non-error value to 500 without details", () => {
		expect(mapErrorToResponse("boom")).toEqual({
			status: 500,
			body: { status: "ERROR", error_code: 4005, message: "An unexpected error has occurred" },
		});
	});
});

// ============================================================================
// FiberFailure
// ============================================================================

describe("mapErrorToResponse — FiberFailure", () => {
	it("unwraps the failure thrown by runSync", () => {
		let thrown: unknown;
		try {
			Effect.runSync(
				Effect.fail(new NotFoundError({ collection: "users", id: "u1", message: "Record u1 not found in users" })),
			);
		} catch (error) {
			thrown = error;
		}

		expect(thrown).toBeDefined();
		expect(mapErrorToResponse(thrown).status).toBe(404);
	});

	it("unwraps an HttpError failure", async () => {
		const thrown = await Effect.runPromise(Effect.fail(badRequest(ErrorCodes.INVALID_CONTENT))).then(
			() => undefined,
			(error: unknown) => error,
		);

		expect(mapErrorToResponse(thrown)).toEqual({
			status: 400,
			body: { status: "ERROR", error_code: 4004, message: "Request has invalid content" },
		});
	});
});
