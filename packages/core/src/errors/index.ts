// ============================================================================
// Validation Errors (re-exported from validation-errors.ts)
// ============================================================================

export type {
	FieldError,
	FieldErrorEntry,
	FieldErrorMap,
} from "./validation-errors.js";
export {
	fieldError,
	InvalidValidatorError,
	ValidationFailedError,
} from "./validation-errors.js";

// ============================================================================
// Storage Errors (re-exported from storage-errors.ts)
// ============================================================================

export type { RepositoryError, StorageOperation } from "./storage-errors.js";
export { NotFoundError, StorageError } from "./storage-errors.js";

// ============================================================================
// Config Errors (re-exported from config-errors.ts)
// ============================================================================

export { ConfigLoadError } from "./config-errors.js";
