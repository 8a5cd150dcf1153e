import type { FieldError } from "../errors/validation-errors.js";

/**
 * Accepted values and per-field errors of one validation run. A failing
 * field's raw input is kept in `result` as well, for echoing back to clients.
 */
export class ValidationResult {
	private readonly values: Record<string, unknown> = {};
	private readonly fieldErrors: Record<string, FieldError> = {};

	addField(field: string, value: unknown): void {
		this.values[field] = value;
	}

	addFieldError(field: string, value: unknown, error: FieldError): void {
		this.addField(field, value);
		this.fieldErrors[field] = error;
	}

	hasErrors(): boolean {
		return Object.keys(this.fieldErrors).length > 0;
	}

	get result(): Readonly<Record<string, unknown>> {
		return this.values;
	}

	get errors(): Readonly<Record<string, FieldError>> {
		return this.fieldErrors;
	}
}
