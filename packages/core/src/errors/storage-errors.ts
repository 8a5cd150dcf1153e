import { Data } from "effect";

// ============================================================================
// Effect TaggedError Storage Error Types
// ============================================================================

export type StorageOperation =
	| "connect"
	| "find"
	| "findOne"
	| "findOneAndUpdate"
	| "count"
	| "insert"
	| "update"
	| "delete";

export class StorageError extends Data.TaggedError("StorageError")<{
	readonly collection: string;
	readonly operation: StorageOperation;
	readonly message: string;
	readonly cause?: unknown;
}> {}

export class NotFoundError extends Data.TaggedError("NotFoundError")<{
	readonly collection: string;
	readonly id: string;
	readonly message: string;
}> {}

// ============================================================================
// Repository Error Union
// ============================================================================

export type RepositoryError = StorageError | NotFoundError;
