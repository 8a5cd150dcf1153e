import { Effect, Stream } from "effect";
import type { StorageError } from "../errors/storage-errors.js";
import type { DocumentStore, FindQuery, StoredRecord } from "../repository/document-store.js";
import type { Repository } from "../repository/repository.js";
import type { ListBuilder } from "./list-builder.js";
import type { ListResource, ListSerialization } from "./list-resource.js";

/**
 * Fetched rows: a list, or a map keyed by record id.
 */
export type ListRows = ReadonlyArray<unknown> | Readonly<Record<string, unknown>>;

export interface ListPage {
	readonly rows: ListRows;
	readonly total: number;
}

// ============================================================================
// Serialization
// ============================================================================

const resolveSerializer = <A>(
	repository: Repository<A>,
	serialization: ListSerialization<A>,
): ((row: StoredRecord) => unknown) => {
	if (serialization.rowAsRecord) {
		const { serialize } = serialization;
		return serialize === undefined ? (row) => row : serialize;
	}
	const { serialize } = serialization;
	return serialize === undefined
		? (row) => repository.deserialize(row)
		: (row) => serialize(repository.deserialize(row));
};

const rowCount = (rows: ListRows): number =>
	Array.isArray(rows) ? rows.length : Object.keys(rows).length;

// ============================================================================
// Execution
// ============================================================================

/**
 * Builds the store query from the accumulated builder state.
 */
export const toFindQuery = <A>(resource: ListResource<A>, builder: ListBuilder<A>): FindQuery => {
	const { filtering, sorting, pagination, projection } = builder;
	const hasFilter = Object.keys(filtering).length > 0;
	return {
		filter: hasFilter ? (resource.postProcessFiltering?.(filtering) ?? filtering) : {},
		sort: sorting === undefined ? undefined : [[sorting.field, sorting.direction === "desc" ? -1 : 1]],
		limit: pagination?.limit,
		skip: pagination?.offset,
		projection: projection !== undefined && Object.keys(projection).length > 0 ? projection : undefined,
	};
};

export const executeList = <A>(
	resource: ListResource<A>,
	builder: ListBuilder<A>,
): Effect.Effect<ListRows, StorageError, DocumentStore> => {
	const { repository } = resource;
	const query = toFindQuery(resource, builder);
	const { asMap } = builder.serialization;
	const serialize = resolveSerializer(repository, builder.serialization);

	const rows = repository.find(query);
	const collected: Effect.Effect<ListRows, StorageError, DocumentStore> = asMap
		? Effect.suspend(() => {
				const byId: Record<string, unknown> = {};
				return Stream.runForEach(rows, (row) =>
					Effect.sync(() => {
						byId[String(row[repository.idField])] = serialize(row);
					}),
				).pipe(Effect.as(byId));
			})
		: Stream.runCollect(Stream.map(rows, serialize)).pipe(Effect.map((chunk) => Array.from(chunk)));

	return collected.pipe(
		Effect.tap((result) =>
			Effect.logDebug("list fetched").pipe(Effect.annotateLogs({ rows: rowCount(result), query })),
		),
		Effect.annotateLogs("collection", repository.collection),
		Effect.withLogSpan("list.fetch"),
	);
};

/**
 * Fetches a page together with the total number of matching records. The
 * count query is skipped when the page alone determines the total.
 */
export const executeListWithCount = <A>(
	resource: ListResource<A>,
	builder: ListBuilder<A>,
): Effect.Effect<ListPage, StorageError, DocumentStore> =>
	Effect.gen(function* () {
		const rows = yield* executeList(resource, builder);
		const length = rowCount(rows);
		const { pagination } = builder;
		const offset = pagination?.offset ?? 0;

		const needsCount =
			length > 0
				? pagination !== undefined && (offset !== 0 || length >= pagination.limit)
				: offset > 0;
		if (!needsCount) return { rows, total: length };

		const { filter } = toFindQuery(resource, builder);
		const total = yield* resource.repository.count(filter);
		return { rows, total };
	});
