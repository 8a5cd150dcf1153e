/**
 * Framework-agnostic handler factories.
 *
 * Adapters for a specific framework convert their native request into a
 * `RestRequest`, call the handler and write the `RestResponse` back.
 *
 * @module
 */

import {
	type DocumentStore,
	ListBuilder,
	type ListResource,
	type Repository,
} from "@restdoc/core";
import { Cause, Effect, Exit, type ManagedRuntime } from "effect";
import { mapErrorToResponse } from "./error-mapping.js";
import { queryParam, type RequestQuery, toRawQuery, tryParseUuid } from "./request.js";
import { okResponse, type RestResponse } from "./response.js";

// ============================================================================
// Types
// ============================================================================

export interface RestRequest {
	/**
	 * Path parameters extracted by the router, e.g. `{ id: "..." }` for
	 * `/users/:id`.
	 */
	readonly params: Readonly<Record<string, string>>;
	readonly query: RequestQuery;
	readonly body: unknown;
}

export type RestHandler = (req: RestRequest) => Promise<RestResponse>;

/**
 * Runtime holding the DocumentStore. Built once at startup with
 * `ManagedRuntime.make(layer)` and shared by every handler, so the store's
 * connection outlives single requests; dispose it on shutdown.
 */
export type StoreRuntime<E> = ManagedRuntime.ManagedRuntime<DocumentStore, E>;

export interface ListHandlerOptions<A, E> {
	readonly runtime: StoreRuntime<E>;
	readonly serialize?: (entity: A) => unknown;
	readonly perPage?: number;
	readonly maxPerPage?: number;
	/**
	 * Extra builder steps, such as filters derived from the caller.
	 */
	readonly configure?: (builder: ListBuilder<A>, req: RestRequest) => ListBuilder<A>;
}

// ============================================================================
// Running
// ============================================================================

/**
 * Runs a handler effect on `runtime`; failures and defects, including a
 * runtime whose layer failed to build, become error responses.
 */
export const runHandler = <R, E, ER>(
	runtime: ManagedRuntime.ManagedRuntime<R, ER>,
	effect: Effect.Effect<RestResponse, E, R>,
): Promise<RestResponse> =>
	runtime
		.runPromiseExit(effect.pipe(Effect.tapErrorCause((cause) => Effect.logError("request failed", cause))))
		.then((exit) =>
			Exit.match(exit, {
				onFailure: (cause) => mapErrorToResponse(Cause.squash(cause)),
				onSuccess: (response) => response,
			}),
		);

// ============================================================================
// Handler factories
// ============================================================================

/**
 * GET handler for a list resource. Reads `page`, `limit`, `sort`, `order` and
 * the resource's query filters, and responds with
 * `{ status: "OK", data, totalCount }`.
 */
export const createListHandler =
	<A, E>(resource: ListResource<A>, options: ListHandlerOptions<A, E>): RestHandler =>
	(req) => {
		const { query } = req;
		const builder = new ListBuilder(resource)
			.withQuery(toRawQuery(query))
			.withPagination(queryParam(query, "page"), queryParam(query, "limit"), options.perPage, options.maxPerPage)
			.withSorting(queryParam(query, "sort"), queryParam(query, "order"))
			.withSerialization(options.serialize);
		const configured = options.configure?.(builder, req) ?? builder;

		return runHandler(
			options.runtime,
			configured.fetchWithCount().pipe(
				Effect.map(({ rows, total }) => okResponse({ data: rows }, total)),
				Effect.annotateLogs("resource", resource.repository.collection),
			),
		);
	};

/**
 * GET handler for one document by the `id` path parameter: 400 on a
 * malformed id, 404 when there is no such document.
 */
export const createFindByIdHandler =
	<A, E>(
		repository: Repository<A>,
		runtime: StoreRuntime<E>,
		serialize: (entity: A) => unknown = (entity) => entity,
	): RestHandler =>
	(req) =>
		runHandler(
			runtime,
			tryParseUuid(req.params.id).pipe(
				Effect.flatMap((id) => repository.getById(id)),
				Effect.map((entity) => okResponse({ data: serialize(entity) })),
				Effect.annotateLogs("resource", repository.collection),
			),
		);
