export type {
	DeleteResult,
	DocumentStoreShape,
	Filter,
	FindOneAndUpdateOptions,
	FindOneOptions,
	FindQuery,
	InsertResult,
	Projection,
	SortDirection,
	SortSpec,
	StoredRecord,
	UpdateDocument,
	UpdateOptions,
	UpdateResult,
} from "./document-store.js";
export { DocumentStore } from "./document-store.js";
export type { InMemoryCollections } from "./in-memory-store-layer.js";
export { makeInMemoryDocumentStoreLayer } from "./in-memory-store-layer.js";
export type { Mapper } from "./mapper.js";
export { documentMapper, recordMapper } from "./mapper.js";
export { escapeRegex, inMatch, matchDateRange, matchString, setChanges } from "./query-helpers.js";
export { compareValues, isOperatorUpdate, matchesFilter } from "./query-matcher.js";
export type { FindByIdsOptions, Repository, RepositoryConfig } from "./repository.js";
export { makeRepository } from "./repository.js";
