import { Effect, Either } from "effect";
import { ValueObject } from "../data/value-object.js";
import {
	type FieldError,
	InvalidValidatorError,
	ValidationFailedError,
} from "../errors/validation-errors.js";
import { accessorFor, type FieldAccessor, type ValidationInput } from "./accessor.js";
import { ErrorCode } from "./error-codes.js";
import { failure, isOutcome, type Outcome, success } from "./outcome.js";
import {
	fieldName,
	isRequiredKey,
	type ValidationSchema,
	type ValidatorLike,
} from "./schema.js";
import { isValidatorSpec, runValidator } from "./val.js";
import { ValidationResult } from "./validation-result.js";

// ============================================================================
// Chains
// ============================================================================

const applyValidator = (
	validator: ValidatorLike,
	value: unknown,
	field: string,
	position: number,
): Outcome => {
	if (isValidatorSpec(validator)) return runValidator(validator, value);
	if (typeof validator === "function") {
		const outcome: unknown = validator(value);
		if (isOutcome(outcome)) return outcome;
		throw new InvalidValidatorError({
			field,
			position,
			message: `Validator at position ${position} of field "${field}" has returned unexpected result`,
		});
	}
	throw new InvalidValidatorError({
		field,
		position,
		message: `Validator at position ${position} of field "${field}" is unknown`,
	});
};

/**
 * Runs a chain left to right, feeding each accepted value into the next
 * link. Stops at the first failure.
 */
export const validateField = (
	value: unknown,
	chain: ReadonlyArray<ValidatorLike>,
	field = "",
): Outcome => {
	let current = value;
	for (const [position, validator] of chain.entries()) {
		const outcome = applyValidator(validator, current, field, position);
		if (Either.isLeft(outcome)) return outcome;
		current = outcome.right;
	}
	return success(current);
};

const runSchema = (schema: ValidationSchema, accessor: FieldAccessor): ValidationResult => {
	const result = new ValidationResult();
	for (const { key, chain } of schema) {
		const field = fieldName(key);
		const raw = accessor.read(field);
		const value = raw === undefined ? null : raw;
		const outcome =
			isRequiredKey(key) && value === null
				? failure(ErrorCode.REQUIRED, "Missing required value")
				: validateField(value, chain, field);
		Either.match(outcome, {
			onLeft: (error) => result.addFieldError(field, value, error),
			onRight: (accepted) => result.addField(field, accepted),
		});
	}
	return result;
};

// ============================================================================
// Entry points
// ============================================================================

/**
 * Validates every schema field of `data` independently. Other fields of a
 * plain record are passed through unvalidated after the schema fields. A
 * value object is updated with the accepted values only when no field
 * failed.
 *
 * @throws InvalidValidatorError when the schema itself is malformed
 */
export const validate = (data: ValidationInput, schema: ValidationSchema): ValidationResult => {
	const result = runSchema(schema, accessorFor(data));
	if (data instanceof ValueObject) {
		if (!result.hasErrors()) data.update(result.result);
		return result;
	}
	const declared = new Set(schema.map(({ key }) => fieldName(key)));
	for (const [field, value] of Object.entries(data)) {
		if (!declared.has(field)) result.addField(field, value);
	}
	return result;
};

const describeErrors = (errors: Readonly<Record<string, FieldError>>): string =>
	`Validation failed for ${Object.keys(errors).join(", ")}`;

/**
 * `validate` as an Effect: succeeds with the accepted values, fails with
 * `ValidationFailedError` when any field was rejected.
 */
export const validateEffect = (
	data: ValidationInput,
	schema: ValidationSchema,
): Effect.Effect<Readonly<Record<string, unknown>>, ValidationFailedError> =>
	Effect.suspend(() => {
		const result = validate(data, schema);
		if (!result.hasErrors()) return Effect.succeed(result.result);
		const message = describeErrors(result.errors);
		return Effect.logDebug(message).pipe(
			Effect.annotateLogs("fields", Object.keys(result.errors)),
			Effect.andThen(Effect.fail(new ValidationFailedError({ errors: result.errors, message }))),
		);
	});
