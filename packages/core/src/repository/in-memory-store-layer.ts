/**
 * In-memory implementation of DocumentStore as an Effect Layer.
 * Intended for testing: collections live in a Map<string, StoredRecord[]>
 * instead of a database.
 */

import { Effect, Layer, Option, Stream } from "effect";
import { generateId } from "../data/document.js";
import { StorageError } from "../errors/storage-errors.js";
import {
	DocumentStore,
	type DocumentStoreShape,
	type Filter,
	type FindOneAndUpdateOptions,
	type FindQuery,
	type StoredRecord,
	type UpdateDocument,
	type UpdateResult,
} from "./document-store.js";
import {
	applyProjection,
	applyUpdate,
	cloneRecord,
	matchesFilter,
	seedFromFilter,
	sortRecords,
	valuesEqual,
} from "./query-matcher.js";

export type InMemoryCollections = Map<string, Array<StoredRecord>>;

// ============================================================================
// In-memory document store
// ============================================================================

const makeInMemoryDocumentStore = (collections: InMemoryCollections = new Map()): DocumentStoreShape => {
	const recordsOf = (collection: string): Array<StoredRecord> => {
		const existing = collections.get(collection);
		if (existing !== undefined) return existing;
		const created: Array<StoredRecord> = [];
		collections.set(collection, created);
		return created;
	};

	const query = (collection: string, { filter = {}, sort = [], skip = 0, limit = 0, projection = {} }: FindQuery) => {
		const matching = recordsOf(collection).filter((record) => matchesFilter(record, filter));
		const sorted = sortRecords(matching, sort);
		const page = limit > 0 ? sorted.slice(skip, skip + limit) : sorted.slice(skip);
		return page.map((record) => applyProjection(cloneRecord(record), projection));
	};

	const duplicateKey = (collection: string, id: unknown) =>
		new StorageError({
			collection,
			operation: "insert",
			message: `Duplicate key error: _id ${String(id)} already exists in ${collection}`,
		});

	const insert = (collection: string, record: StoredRecord): Effect.Effect<unknown, StorageError> =>
		Effect.suspend(() => {
			const records = recordsOf(collection);
			const stored = cloneRecord(record);
			if (stored._id === undefined) stored._id = generateId();
			if (records.some((existing) => valuesEqual(existing._id, stored._id))) {
				return Effect.fail(duplicateKey(collection, stored._id));
			}
			records.push(stored);
			return Effect.succeed(stored._id);
		});

	const upsert = (collection: string, filter: Filter, update: UpdateDocument) => {
		const seeded = seedFromFilter(filter);
		const created = applyUpdate(seeded, update, true);
		if (created._id === undefined) created._id = seeded._id ?? generateId();
		return insert(collection, created).pipe(Effect.as(created));
	};

	const update = (
		collection: string,
		filter: Filter,
		change: UpdateDocument,
		many: boolean,
		upsertMissing: boolean,
	): Effect.Effect<UpdateResult, StorageError> =>
		Effect.suspend(() => {
			const records = recordsOf(collection);
			let matched = 0;
			for (const [index, record] of records.entries()) {
				if (!matchesFilter(record, filter)) continue;
				matched++;
				records[index] = applyUpdate(record, change, false);
				if (!many) break;
			}
			if (matched > 0 || !upsertMissing) {
				return Effect.succeed({ matched, modified: matched, upsertedId: null });
			}
			return upsert(collection, filter, change).pipe(
				Effect.map((created) => ({ matched: 0, modified: 0, upsertedId: created._id })),
			);
		});

	const remove = (collection: string, filter: Filter, many: boolean) =>
		Effect.sync(() => {
			const records = recordsOf(collection);
			let deleted = 0;
			for (let index = 0; index < records.length; ) {
				const record = records[index];
				if (record !== undefined && matchesFilter(record, filter) && (many || deleted === 0)) {
					records.splice(index, 1);
					deleted++;
				} else {
					index++;
				}
			}
			return { deleted };
		});

	return {
		find: (collection, findQuery) =>
			Stream.suspend(() => Stream.fromIterable(query(collection, findQuery))),

		findOne: (collection, filter, options = {}) =>
			Effect.sync(() => Option.fromNullable(query(collection, { ...options, filter, limit: 1 })[0])),

		findOneAndUpdate: (collection, filter, change, options: FindOneAndUpdateOptions = {}) =>
			Effect.suspend(() => {
				const { returnDocument = "before", upsert: upsertMissing = false, projection = {} } = options;
				const records = recordsOf(collection);
				const index = records.findIndex((record) => matchesFilter(record, filter));
				const current = records[index];
				if (current !== undefined) {
					const updated = applyUpdate(current, change, false);
					records[index] = updated;
					const returned = returnDocument === "after" ? updated : current;
					return Effect.succeed(Option.some(applyProjection(cloneRecord(returned), projection)));
				}
				if (!upsertMissing) return Effect.succeed(Option.none());
				return upsert(collection, filter, change).pipe(
					Effect.map((created) =>
						returnDocument === "after"
							? Option.some(applyProjection(cloneRecord(created), projection))
							: Option.none(),
					),
				);
			}),

		count: (collection, filter) =>
			Effect.sync(() => recordsOf(collection).filter((record) => matchesFilter(record, filter)).length),

		insertOne: (collection, record) =>
			insert(collection, record).pipe(Effect.map((insertedId) => ({ insertedId }))),

		updateOne: (collection, filter, change, options = {}) =>
			update(collection, filter, change, false, options.upsert ?? false),

		updateMany: (collection, filter, change) => update(collection, filter, change, true, false),

		deleteOne: (collection, filter) => remove(collection, filter, false),

		deleteMany: (collection, filter) => remove(collection, filter, true),
	};
};

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Create an in-memory DocumentStore layer.
 * Pass a pre-populated Map to seed collections, or to inspect them after a
 * test runs.
 */
export const makeInMemoryDocumentStoreLayer = (
	collections: InMemoryCollections = new Map(),
): Layer.Layer<DocumentStore> => Layer.succeed(DocumentStore, makeInMemoryDocumentStore(collections));
