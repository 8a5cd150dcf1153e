import { ValueObject } from "../data/value-object.js";

/**
 * Uniform read access to the input of a validation run.
 */
export interface FieldAccessor {
	readonly read: (field: string) => unknown;
}

export type ValidationInput = Readonly<Record<string, unknown>> | ValueObject;

export const recordAccessor = (data: Readonly<Record<string, unknown>>): FieldAccessor => ({
	read: (field) => (Object.hasOwn(data, field) ? data[field] : undefined),
});

export const valueObjectAccessor = (data: ValueObject): FieldAccessor => ({
	read: (field) => data.get(field),
});

export const accessorFor = (data: ValidationInput): FieldAccessor =>
	data instanceof ValueObject ? valueObjectAccessor(data) : recordAccessor(data);
