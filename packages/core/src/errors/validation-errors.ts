import { Data } from "effect";

// ============================================================================
// Field-level errors
// ============================================================================

/**
 * A single validation failure: a stable numeric code and a human-readable
 * message. Codes are listed in `ErrorCode`.
 */
export interface FieldErrorEntry {
	readonly code: number;
	readonly message: string;
}

/**
 * Per-sub-field failures of a composite value (an address, for instance).
 */
export type FieldErrorMap = Readonly<Record<string, FieldErrorEntry>>;

export type FieldError = FieldErrorEntry | FieldErrorMap;

export const fieldError = (code: number, message: string): FieldErrorEntry => ({
	code,
	message,
});

// ============================================================================
// Effect TaggedError Validation Error Types
// ============================================================================

/**
 * Raised by `validateEffect` when at least one field of the input failed.
 */
export class ValidationFailedError extends Data.TaggedError(
	"ValidationFailedError",
)<{
	readonly errors: Readonly<Record<string, FieldError>>;
	readonly message: string;
}> {}

/**
 * A schema contains something the engine cannot run: a chain element that is
 * neither a validator spec nor a function, or a function that did not return
 * an Either. This is a programming error and is thrown, never collected.
 */
export class InvalidValidatorError extends Data.TaggedError(
	"InvalidValidatorError",
)<{
	readonly field: string;
	readonly position: number;
	readonly message: string;
}> {}
