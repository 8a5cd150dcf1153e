import { Context, type Effect, type Option, type Stream } from "effect";
import type { StorageError } from "../errors/storage-errors.js";

// ============================================================================
// Query shapes
// ============================================================================

/**
 * A record as the database stores it, identified by `_id`.
 */
export type StoredRecord = Record<string, unknown>;

/**
 * A MongoDB-style filter document: field equality plus `$`-operators.
 */
export type Filter = Readonly<Record<string, unknown>>;

/**
 * A MongoDB-style update document (`$set`, `$setOnInsert`, `$unset`, `$inc`),
 * or a replacement record when it carries no operators.
 */
export type UpdateDocument = Readonly<Record<string, unknown>>;

export type SortDirection = 1 | -1;

/**
 * Ordered sort keys; earlier pairs take precedence.
 */
export type SortSpec = ReadonlyArray<readonly [field: string, direction: SortDirection]>;

/**
 * Field inclusion (`true`) or exclusion (`false`) map.
 */
export type Projection = Readonly<Record<string, boolean>>;

export interface FindQuery {
	readonly filter?: Filter;
	readonly sort?: SortSpec;
	readonly limit?: number;
	readonly skip?: number;
	readonly projection?: Projection;
}

export interface FindOneOptions {
	readonly sort?: SortSpec;
	readonly projection?: Projection;
}

export interface FindOneAndUpdateOptions {
	readonly returnDocument?: "before" | "after";
	readonly upsert?: boolean;
	readonly projection?: Projection;
}

export interface UpdateOptions {
	readonly upsert?: boolean;
}

export interface InsertResult {
	readonly insertedId: unknown;
}

export interface UpdateResult {
	readonly matched: number;
	readonly modified: number;
	readonly upsertedId: unknown;
}

export interface DeleteResult {
	readonly deleted: number;
}

// ============================================================================
// DocumentStore Service Interface
// ============================================================================

/**
 * Shape of the DocumentStore service: the driver contract every repository
 * runs on. Each operation names its collection; failures surface as
 * StorageError.
 */
export interface DocumentStoreShape {
	/**
	 * Stream matching records, applying sort, skip, limit and projection in
	 * that order.
	 */
	readonly find: (collection: string, query: FindQuery) => Stream.Stream<StoredRecord, StorageError>;

	readonly findOne: (
		collection: string,
		filter: Filter,
		options?: FindOneOptions,
	) => Effect.Effect<Option.Option<StoredRecord>, StorageError>;

	/**
	 * Atomically update the first match and return it as it was before or
	 * after the update. With `upsert`, a missing record is created.
	 */
	readonly findOneAndUpdate: (
		collection: string,
		filter: Filter,
		update: UpdateDocument,
		options?: FindOneAndUpdateOptions,
	) => Effect.Effect<Option.Option<StoredRecord>, StorageError>;

	readonly count: (collection: string, filter: Filter) => Effect.Effect<number, StorageError>;

	readonly insertOne: (
		collection: string,
		record: StoredRecord,
	) => Effect.Effect<InsertResult, StorageError>;

	readonly updateOne: (
		collection: string,
		filter: Filter,
		update: UpdateDocument,
		options?: UpdateOptions,
	) => Effect.Effect<UpdateResult, StorageError>;

	readonly updateMany: (
		collection: string,
		filter: Filter,
		update: UpdateDocument,
	) => Effect.Effect<UpdateResult, StorageError>;

	readonly deleteOne: (collection: string, filter: Filter) => Effect.Effect<DeleteResult, StorageError>;

	readonly deleteMany: (collection: string, filter: Filter) => Effect.Effect<DeleteResult, StorageError>;
}

// ============================================================================
// DocumentStore Context.Tag
// ============================================================================

export class DocumentStore extends Context.Tag("DocumentStore")<
	DocumentStore,
	DocumentStoreShape
>() {}
