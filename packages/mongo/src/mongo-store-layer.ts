/**
 * MongoDB implementation of DocumentStore as an Effect Layer.
 * The client is acquired when the layer is built and closed with its scope.
 */

import {
	DocumentStore,
	type DocumentStoreShape,
	type FindOneAndUpdateOptions,
	type FindQuery,
	isOperatorUpdate,
	type Projection,
	type SortSpec,
	StorageError,
	type StorageOperation,
} from "@restdoc/core";
import { Effect, Layer, Option, Stream } from "effect";
import { type Db, type Document, type FindOptions, MongoClient, type MongoClientOptions } from "mongodb";
import { MongoConfig } from "./mongo-config.js";

// ============================================================================
// Helpers
// ============================================================================

const toStorageError = (collection: string, operation: StorageOperation, error: unknown): StorageError =>
	new StorageError({
		collection,
		operation,
		message: error instanceof Error ? error.message : `Unknown ${operation} error`,
		cause: error,
	});

/**
 * Copies a record into a driver document.
 */
export const toDocument = (record: Readonly<Record<string, unknown>>): Document => {
	const document: Document = {};
	for (const [key, value] of Object.entries(record)) {
		document[key] = value;
	}
	return document;
};

/**
 * Ordered sort pairs as a driver sort document; key order is precedence.
 */
export const toSortSpec = (sort: SortSpec): Record<string, 1 | -1> => {
	const spec: Record<string, 1 | -1> = {};
	for (const [field, direction] of sort) {
		spec[field] = direction;
	}
	return spec;
};

const toProjection = (projection: Projection | undefined): Document | undefined =>
	projection === undefined || Object.keys(projection).length === 0 ? undefined : toDocument(projection);

/**
 * Driver find options for a query. Zero or missing limit and skip are left out.
 */
export const toFindOptions = ({ sort, limit, skip, projection }: FindQuery): FindOptions => {
	const options: FindOptions = {};
	if (sort !== undefined && sort.length > 0) options.sort = toSortSpec(sort);
	if (limit !== undefined && limit > 0) options.limit = limit;
	if (skip !== undefined && skip > 0) options.skip = skip;
	const fields = toProjection(projection);
	if (fields !== undefined) options.projection = fields;
	return options;
};

// ============================================================================
// Store operations
// ============================================================================

export const makeMongoStore = (db: Db): DocumentStoreShape => {
	const run = <A>(collection: string, operation: StorageOperation, task: () => Promise<A>) =>
		Effect.tryPromise({
			try: task,
			catch: (error) => toStorageError(collection, operation, error),
		});

	const updateOne = (
		collection: string,
		filter: Readonly<Record<string, unknown>>,
		change: Readonly<Record<string, unknown>>,
		upsert: boolean,
	) =>
		isOperatorUpdate(change)
			? db.collection(collection).updateOne(toDocument(filter), toDocument(change), { upsert })
			: db.collection(collection).replaceOne(toDocument(filter), toDocument(change), { upsert });

	return {
		find: (collection, query) =>
			Stream.suspend(() =>
				Stream.fromAsyncIterable(
					db.collection(collection).find(toDocument(query.filter ?? {}), toFindOptions(query)),
					(error) => toStorageError(collection, "find", error),
				),
			),

		findOne: (collection, filter, options = {}) =>
			run(collection, "findOne", () =>
				db.collection(collection).findOne(toDocument(filter), toFindOptions(options)),
			).pipe(Effect.map(Option.fromNullable)),

		findOneAndUpdate: (collection, filter, change, options: FindOneAndUpdateOptions = {}) =>
			run(collection, "findOneAndUpdate", () =>
				db.collection(collection).findOneAndUpdate(toDocument(filter), toDocument(change), {
					returnDocument: options.returnDocument ?? "before",
					upsert: options.upsert ?? false,
					projection: toProjection(options.projection),
				}),
			).pipe(Effect.map(Option.fromNullable)),

		count: (collection, filter) =>
			run(collection, "count", () => db.collection(collection).countDocuments(toDocument(filter))),

		insertOne: (collection, record) =>
			run(collection, "insert", () => db.collection(collection).insertOne(toDocument(record))).pipe(
				Effect.map((result) => ({ insertedId: result.insertedId })),
			),

		updateOne: (collection, filter, change, options = {}) =>
			run(collection, "update", () => updateOne(collection, filter, change, options.upsert ?? false)).pipe(
				Effect.map((result) => ({
					matched: result.matchedCount,
					modified: result.modifiedCount,
					upsertedId: result.upsertedId,
				})),
			),

		updateMany: (collection, filter, change) =>
			run(collection, "update", () =>
				db.collection(collection).updateMany(toDocument(filter), toDocument(change)),
			).pipe(
				Effect.map((result) => ({
					matched: result.matchedCount,
					modified: result.modifiedCount,
					upsertedId: result.upsertedId,
				})),
			),

		deleteOne: (collection, filter) =>
			run(collection, "delete", () => db.collection(collection).deleteOne(toDocument(filter))).pipe(
				Effect.map((result) => ({ deleted: result.deletedCount })),
			),

		deleteMany: (collection, filter) =>
			run(collection, "delete", () => db.collection(collection).deleteMany(toDocument(filter))).pipe(
				Effect.map((result) => ({ deleted: result.deletedCount })),
			),
	};
};

// ============================================================================
// Layer construction
// ============================================================================

const clientOptions = (config: MongoConfig): MongoClientOptions =>
	Option.match(config.appName, {
		onNone: () => ({}),
		onSome: (appName) => ({ appName }),
	});

const acquireClient = (config: MongoConfig) =>
	Effect.acquireRelease(
		Effect.tryPromise({
			try: () => new MongoClient(config.uri, clientOptions(config)).connect(),
			catch: (error) => toStorageError(config.database, "connect", error),
		}).pipe(
			Effect.tap(() =>
				Effect.logDebug("connected to mongo").pipe(Effect.annotateLogs("database", config.database)),
			),
		),
		(client) =>
			Effect.tryPromise(() => client.close()).pipe(
				Effect.catchAll((error) =>
					Effect.logWarning("failed to close mongo client").pipe(Effect.annotateLogs("error", String(error))),
				),
			),
	);

export const makeMongoDocumentStoreLayer = (config: MongoConfig): Layer.Layer<DocumentStore, StorageError> =>
	Layer.scoped(
		DocumentStore,
		Effect.map(acquireClient(config), (client) => makeMongoStore(client.db(config.database))),
	);

/**
 * DocumentStore over the database named by the `mongo` config section.
 */
export const MongoLive = Layer.unwrapEffect(Effect.map(MongoConfig, makeMongoDocumentStoreLayer));
