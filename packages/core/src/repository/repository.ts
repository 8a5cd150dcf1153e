import { Effect, Option, Stream } from "effect";
import { NotFoundError, type StorageError } from "../errors/storage-errors.js";
import {
	type DeleteResult,
	DocumentStore,
	type DocumentStoreShape,
	type Filter,
	type FindOneOptions,
	type FindQuery,
	type InsertResult,
	type Projection,
	type SortSpec,
	type StoredRecord,
	type UpdateDocument,
	type UpdateResult,
} from "./document-store.js";
import type { Mapper } from "./mapper.js";
import { inMatch, setChanges } from "./query-helpers.js";

// ============================================================================
// Types
// ============================================================================

export interface RepositoryConfig<A> {
	readonly collection: string;
	readonly mapper: Mapper<A>;
}

export interface FindByIdsOptions {
	readonly filter?: Filter;
	readonly sort?: SortSpec;
	readonly limit?: number;
	readonly skip?: number;
}

type StoreEffect<A> = Effect.Effect<A, StorageError, DocumentStore>;

/**
 * Data access for one collection. Every operation needs a DocumentStore in
 * context; nothing is cached between calls.
 */
export interface Repository<A> {
	readonly collection: string;
	readonly idField: string;
	readonly serialize: (entity: A, fields?: ReadonlyArray<string>) => StoredRecord;
	readonly deserialize: (record: Readonly<StoredRecord>) => A;

	readonly findById: (id: unknown, projection?: Projection) => StoreEffect<Option.Option<A>>;
	/**
	 * Like `findById`, failing with NotFoundError when there is no such record.
	 */
	readonly getById: (id: unknown) => Effect.Effect<A, StorageError | NotFoundError, DocumentStore>;
	readonly findOne: (filter: Filter, options?: FindOneOptions) => StoreEffect<Option.Option<A>>;
	/**
	 * Raw records, as the store returns them.
	 */
	readonly find: (query?: FindQuery) => Stream.Stream<StoredRecord, StorageError, DocumentStore>;
	readonly findDocuments: (query?: FindQuery) => Stream.Stream<A, StorageError, DocumentStore>;
	readonly findByIds: (
		ids: ReadonlyArray<unknown>,
		options?: FindByIdsOptions,
	) => Stream.Stream<StoredRecord, StorageError, DocumentStore>;
	readonly count: (filter?: Filter) => StoreEffect<number>;

	readonly insert: (entity: A, options?: { readonly enforceId?: boolean }) => StoreEffect<InsertResult>;
	readonly update: (id: unknown, changes: Readonly<Record<string, unknown>>) => StoreEffect<UpdateResult>;
	readonly updateWith: (id: unknown, update: UpdateDocument) => StoreEffect<UpdateResult>;
	readonly updateOne: (filter: Filter, changes: Readonly<Record<string, unknown>>) => StoreEffect<UpdateResult>;
	readonly updateMany: (filter: Filter, changes: Readonly<Record<string, unknown>>) => StoreEffect<UpdateResult>;
	readonly findByIdAndUpdate: (
		id: unknown,
		changes: Readonly<Record<string, unknown>>,
		options?: { readonly returnDocument?: "before" | "after" },
	) => StoreEffect<Option.Option<StoredRecord>>;
	readonly findOneAndUpdate: (
		filter: Filter,
		update: UpdateDocument,
		options?: { readonly returnDocument?: "before" | "after"; readonly upsert?: boolean },
	) => StoreEffect<Option.Option<StoredRecord>>;
	/**
	 * Returns the matching record after applying `update`, creating it when
	 * nothing matches.
	 */
	readonly findOneOrInsert: (filter: Filter, update: UpdateDocument) => StoreEffect<Option.Option<StoredRecord>>;
	readonly updateOrInsert: (
		filter: Filter,
		changes: Readonly<Record<string, unknown>>,
		setOnInsert?: Readonly<Record<string, unknown>>,
	) => StoreEffect<UpdateResult>;

	readonly delete: (id: unknown) => StoreEffect<DeleteResult>;
	readonly deleteOne: (filter: Filter) => StoreEffect<DeleteResult>;
	readonly deleteKeys: (ids: ReadonlyArray<unknown>) => StoreEffect<DeleteResult>;
	readonly deleteMany: (filter: Filter) => StoreEffect<DeleteResult>;
	readonly purge: () => StoreEffect<DeleteResult>;
}

// ============================================================================
// Factory
// ============================================================================

export const makeRepository = <A>({ collection, mapper }: RepositoryConfig<A>): Repository<A> => {
	const { idField } = mapper;
	const byId = (id: unknown): Filter => ({ [idField]: id });

	const withStore = <B>(run: (store: DocumentStoreShape) => Effect.Effect<B, StorageError>): StoreEffect<B> =>
		Effect.flatMap(DocumentStore, run);

	const logWrite =
		(operation: string) =>
		<B>(effect: StoreEffect<B>): StoreEffect<B> =>
			Effect.tap(effect, (result) =>
				Effect.logDebug(`${operation} on ${collection}`).pipe(Effect.annotateLogs({ collection, result })),
			);

	const find = (query: FindQuery = {}) =>
		Stream.unwrap(Effect.map(DocumentStore, (store) => store.find(collection, query)));

	const findOneAndUpdate: Repository<A>["findOneAndUpdate"] = (filter, update, options = {}) =>
		withStore((store) =>
			store.findOneAndUpdate(collection, filter, update, {
				returnDocument: options.returnDocument ?? "before",
				upsert: options.upsert ?? false,
			}),
		);

	const updateWith = (filter: Filter, update: UpdateDocument, options: { readonly upsert?: boolean } = {}) =>
		withStore((store) => store.updateOne(collection, filter, update, options)).pipe(logWrite("update"));

	const findOne = (filter: Filter, options?: FindOneOptions) =>
		withStore((store) => store.findOne(collection, filter, options)).pipe(
			Effect.map(Option.map(mapper.deserialize)),
		);

	return {
		collection,
		idField,
		serialize: mapper.serialize,
		deserialize: mapper.deserialize,

		findById: (id, projection) => findOne(byId(id), projection === undefined ? {} : { projection }),

		getById: (id) =>
			findOne(byId(id)).pipe(
				Effect.flatMap(
					Option.match({
						onNone: () =>
							Effect.fail(
								new NotFoundError({
									collection,
									id: String(id),
									message: `Record ${String(id)} not found in ${collection}`,
								}),
							),
						onSome: (entity) => Effect.succeed(entity),
					}),
				),
			),

		findOne,
		find,
		findDocuments: (query) => find(query).pipe(Stream.map(mapper.deserialize)),

		findByIds: (ids, options = {}) => {
			const filter: Record<string, unknown> = { ...options.filter };
			if (ids.length > 0) filter[idField] = inMatch(ids);
			return find({ filter, sort: options.sort, limit: options.limit, skip: options.skip });
		},

		count: (filter = {}) => withStore((store) => store.count(collection, filter)),

		insert: (entity, { enforceId = true } = {}) => {
			const { [idField]: id, ...rest } = mapper.serialize(entity);
			const record = enforceId ? { ...rest, [idField]: id } : rest;
			return withStore((store) => store.insertOne(collection, record)).pipe(logWrite("insert"));
		},

		update: (id, changes) => updateWith(byId(id), setChanges(changes)),
		updateWith: (id, update) => updateWith(byId(id), update),
		updateOne: (filter, changes) => updateWith(filter, setChanges(changes)),
		updateMany: (filter, changes) =>
			withStore((store) => store.updateMany(collection, filter, setChanges(changes))).pipe(
				logWrite("updateMany"),
			),

		findByIdAndUpdate: (id, changes, options = {}) =>
			findOneAndUpdate(byId(id), setChanges(changes), options),
		findOneAndUpdate,
		findOneOrInsert: (filter, update) =>
			findOneAndUpdate(filter, update, { returnDocument: "after", upsert: true }),
		updateOrInsert: (filter, changes, setOnInsert) =>
			updateWith(
				filter,
				setOnInsert !== undefined && Object.keys(setOnInsert).length > 0
					? { ...setChanges(changes), $setOnInsert: setOnInsert }
					: setChanges(changes),
				{ upsert: true },
			),

		delete: (id) => withStore((store) => store.deleteOne(collection, byId(id))).pipe(logWrite("delete")),
		deleteOne: (filter) => withStore((store) => store.deleteOne(collection, filter)).pipe(logWrite("delete")),
		deleteKeys: (ids) =>
			withStore((store) => store.deleteMany(collection, { [idField]: inMatch(ids) })).pipe(
				logWrite("deleteMany"),
			),
		deleteMany: (filter) =>
			withStore((store) => store.deleteMany(collection, filter)).pipe(logWrite("deleteMany")),
		purge: () => withStore((store) => store.deleteMany(collection, {})).pipe(logWrite("purge")),
	};
};
