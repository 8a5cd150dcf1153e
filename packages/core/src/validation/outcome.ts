import { Either } from "effect";
import { type FieldError, fieldError } from "../errors/validation-errors.js";

// ============================================================================
// Outcome
// ============================================================================

/**
 * The result of one validator invocation. `Right` carries the accepted
 * (possibly normalised) value, `Left` the reason it was rejected.
 */
export type Outcome<A = unknown> = Either.Either<A, FieldError>;

export const success = <A>(value: A): Outcome<A> => Either.right(value);

export const failure = (code: number, message: string): Outcome<never> =>
	Either.left(fieldError(code, message));

export const failWith = (error: FieldError): Outcome<never> => Either.left(error);

export const isOutcome = (value: unknown): value is Outcome<unknown> =>
	Either.isEither(value);
