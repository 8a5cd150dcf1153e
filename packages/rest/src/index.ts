/**
 * Framework-agnostic REST helpers: request parsing and validation, success
 * and error responses, CORS headers and handler factories for list and
 * find-by-id endpoints.
 *
 * @example
 * ```ts
 * import { createListHandler } from "@restdoc/rest"
 * import { MongoLive } from "@restdoc/mongo"
 * import { ManagedRuntime } from "effect"
 *
 * const runtime = ManagedRuntime.make(MongoLive)
 * const listUsers = createListHandler(usersResource, { runtime })
 *
 * // GET /users?page=2&limit=20&sort=name&order=desc
 * const response = await listUsers({ params: {}, query: req.query, body: null })
 * ```
 *
 * @module
 */

// ============================================================================
// Errors
// ============================================================================

export { type ErrorCodeName, type ErrorEntry, ErrorCodes } from "./error-codes.js";
export {
	badRequest,
	conflict,
	forbidden,
	HttpError,
	httpError,
	internalError,
	methodNotAllowed,
	notAcceptable,
	notFound,
	notImplemented,
	unauthorized,
} from "./http-error.js";
export { type ErrorBody, type ErrorResponse, mapErrorToResponse } from "./error-mapping.js";

// ============================================================================
// Requests and responses
// ============================================================================

export {
	parseJsonBody,
	queryParam,
	type RequestQuery,
	requireJsonContent,
	toRawQuery,
	tryParseUuid,
	validateBody,
} from "./request.js";
export {
	corsHeaders,
	encodeJson,
	okResponse,
	optionsResponse,
	type ResponseHeaders,
	type RestResponse,
} from "./response.js";

// ============================================================================
// Handlers
// ============================================================================

export {
	createFindByIdHandler,
	createListHandler,
	type ListHandlerOptions,
	type RestHandler,
	type RestRequest,
	runHandler,
	type StoreRuntime,
} from "./handlers.js";
