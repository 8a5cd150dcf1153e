// ============================================================================
// Query document helpers
// ============================================================================

export const inMatch = (values: ReadonlyArray<unknown>): { readonly $in: ReadonlyArray<unknown> } => ({
	$in: values,
});

export const setChanges = (
	changes: Readonly<Record<string, unknown>>,
): { readonly $set: Readonly<Record<string, unknown>> } => ({ $set: changes });

/**
 * Range condition from two epoch-second bounds in `data`. Bounds that are
 * missing or not integers are left out; an empty object means no bound.
 */
export const matchDateRange = (
	data: Readonly<Record<string, unknown>>,
	fieldFrom?: string,
	fieldTo?: string,
): { $gte?: number; $lte?: number } => {
	const range: { $gte?: number; $lte?: number } = {};
	const from = fieldFrom === undefined ? undefined : data[fieldFrom];
	const to = fieldTo === undefined ? undefined : data[fieldTo];
	if (typeof from === "number" && Number.isInteger(from)) range.$gte = from;
	if (typeof to === "number" && Number.isInteger(to)) range.$lte = to;
	return range;
};

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

export const escapeRegex = (text: string): string => text.replace(REGEX_SPECIALS, "\\$&");

/**
 * Case-insensitive prefix match by default. `matching` is escaped, so it is
 * always taken literally.
 */
export const matchString = (
	matching: string,
	options: { readonly flags?: string; readonly fromStart?: boolean } = {},
): { readonly $regex: string; readonly $options?: string } => {
	const { flags = "i", fromStart = true } = options;
	const pattern = `${fromStart ? "^" : ""}${escapeRegex(matching)}`;
	return flags ? { $regex: pattern, $options: flags } : { $regex: pattern };
};
