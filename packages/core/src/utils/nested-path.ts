/**
 * Utilities for resolving and mutating nested record paths using dot notation.
 */

export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Check if a string is a dot-notation path (contains at least one ".").
 */
export function isDotPath(key: string): boolean {
	return key.includes(".");
}

/**
 * Get a nested value from a record using dot notation.
 *
 * @example
 * getNestedValue({ a: { b: 1 } }, "a.b") // returns 1
 * getNestedValue({ a: { b: 1 } }, "a.c") // returns undefined
 */
export function getNestedValue(obj: Readonly<Record<string, unknown>>, path: string): unknown {
	if (!isDotPath(path)) {
		return obj[path];
	}

	let current: unknown = obj;
	for (const part of path.split(".")) {
		if (!isRecord(current)) {
			return undefined;
		}
		current = current[part];
	}
	return current;
}

export function hasNestedValue(obj: Readonly<Record<string, unknown>>, path: string): boolean {
	const parts = path.split(".");
	const last = parts.pop() ?? path;
	let current: unknown = obj;
	for (const part of parts) {
		if (!isRecord(current)) return false;
		current = current[part];
	}
	return isRecord(current) && last in current;
}

/**
 * Set a value at a dot-notation path, creating intermediate records as needed.
 * Mutates `obj`.
 */
export function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
	const parts = path.split(".");
	const last = parts.pop() ?? path;
	let current = obj;
	for (const part of parts) {
		const next = current[part];
		if (isRecord(next)) {
			current = next;
		} else {
			const created: Record<string, unknown> = {};
			current[part] = created;
			current = created;
		}
	}
	current[last] = value;
}

export function unsetNestedValue(obj: Record<string, unknown>, path: string): void {
	const parts = path.split(".");
	const last = parts.pop() ?? path;
	let current: unknown = obj;
	for (const part of parts) {
		if (!isRecord(current)) return;
		current = current[part];
	}
	if (isRecord(current)) {
		delete current[last];
	}
}
