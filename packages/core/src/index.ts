/**
 * Foundation for REST APIs backed by a document database.
 *
 * Exports the validation engine, value objects and documents, the
 * repository over the DocumentStore service, the list query builder,
 * typed errors, config descriptors and the logging layer.
 */

// ============================================================================
// Errors
// ============================================================================

export * from "./errors/index.js";

// ============================================================================
// Validation
// ============================================================================

export * from "./validation/index.js";

// ============================================================================
// Value objects and documents
// ============================================================================

export { ValueObject } from "./data/value-object.js";
export { Document, generateId } from "./data/document.js";

// ============================================================================
// Repository
// ============================================================================

export * from "./repository/index.js";

// ============================================================================
// List query builder
// ============================================================================

export * from "./list/index.js";

// ============================================================================
// Config and logging
// ============================================================================

export * from "./config/index.js";
export * from "./logging/index.js";

// ============================================================================
// Utilities
// ============================================================================

export { getNestedValue, hasNestedValue, isRecord, setNestedValue, unsetNestedValue } from "./utils/nested-path.js";
