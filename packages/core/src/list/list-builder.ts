import type { Effect } from "effect";
import type { StorageError } from "../errors/storage-errors.js";
import type { DocumentStore, Filter, Projection, StoredRecord } from "../repository/document-store.js";
import { parseInteger } from "../validation/parsers.js";
import { coerceFilterValue, type FieldFilter, type FilterConverter } from "./field-filter.js";
import { executeList, executeListWithCount, type ListPage, type ListRows } from "./list-command.js";
import type {
	ListPagination,
	ListResource,
	ListSerialization,
	ListSort,
	SortOrder,
} from "./list-resource.js";

/**
 * Raw query-string input: every parameter with all of its values, as text or
 * undecoded bytes.
 */
export type RawQuery = Readonly<Record<string, ReadonlyArray<string | Uint8Array>>>;

export interface SerializationOptions {
	readonly asMap?: boolean;
}

const DEFAULT_PER_PAGE = 50;
const DEFAULT_MAX_PER_PAGE = 100;

const utf8 = new TextDecoder("utf-8");

const lastQueryValue = (values: ReadonlyArray<string | Uint8Array>): string | undefined => {
	const last = values[values.length - 1];
	if (last === undefined) return undefined;
	return typeof last === "string" ? last : utf8.decode(last);
};

const isAbsent = (value: unknown): value is null | undefined => value === null || value === undefined;

const isSortOrder = (value: unknown): value is SortOrder => value === "asc" || value === "desc";

/**
 * Accumulates the filtering, sorting, pagination, projection and
 * serialization of one list request, then runs it against the resource's
 * repository.
 *
 * Malformed caller input never fails a step: unknown filters are ignored,
 * bad values fall back to defaults.
 *
 * @example
 * ```ts
 * const page = new ListBuilder(usersResource)
 *   .withQuery(query)
 *   .withPagination(query.page?.[0], query.limit?.[0])
 *   .withSorting("name", "desc")
 *   .fetchWithCount()
 * ```
 */
export class ListBuilder<A> {
	private readonly filter: Record<string, unknown> = {};
	private sort: ListSort | undefined;
	private page: ListPagination | undefined;
	private fields: Projection | undefined;
	private output: ListSerialization<A> | undefined;

	constructor(readonly resource: ListResource<A>) {}

	// ==========================================================================
	// Filtering
	// ==========================================================================

	/**
	 * Applies filters from the query string. Only filters declared with
	 * `fromQuery` are honoured; the last value of a parameter wins.
	 */
	withQuery(query: RawQuery): this {
		this.processFilters((name) => (name in query ? lastQueryValue(query[name] ?? []) : undefined), true);
		return this;
	}

	/**
	 * Applies typed filter values supplied by the application. Every declared
	 * filter is honoured.
	 */
	withFiltering(values: Readonly<Record<string, unknown>>): this {
		this.processFilters((name) => values[name], false, (name) => name in values);
		return this;
	}

	private processFilters(
		read: (name: string) => unknown,
		onlyQuery: boolean,
		has: (name: string) => boolean = (name) => read(name) !== undefined,
	): void {
		for (const [name, filter] of Object.entries(this.resource.filters)) {
			if ((onlyQuery && !filter.fromQuery) || !has(name)) continue;
			this.applyFilter(filter, coerceFilterValue(filter, read(name)));
		}
	}

	private applyFilter(filter: FieldFilter, value: unknown): void {
		const { mapping } = filter;
		if (typeof mapping === "string") {
			this.setCondition(mapping, value, undefined, filter.default);
		} else if (mapping._tag === "FieldMapping") {
			this.setCondition(mapping.field, value, mapping.convert, filter.default);
		} else {
			const condition = value ? mapping.convert(value) : filter.default;
			if (isAbsent(condition)) return;
			this.filter.$or = mapping.fields.map((field) => ({ [field]: condition }));
		}
	}

	private setCondition(
		field: string,
		value: unknown,
		convert: FilterConverter | undefined,
		fallback: unknown,
	): void {
		if (isAbsent(value)) {
			if (fallback !== undefined) this.filter[field] = fallback;
			return;
		}
		this.filter[field] = convert === undefined ? value : convert(value);
	}

	// ==========================================================================
	// Pagination, sorting, projection, serialization
	// ==========================================================================

	/**
	 * `page` is 1-based. Missing, zero or unparseable pages become 1; the
	 * limit defaults to `perPage` and is clamped to `[1, maxPerPage]`.
	 */
	withPagination(
		page: number | string | null | undefined,
		limit: number | string | null | undefined,
		perPage = DEFAULT_PER_PAGE,
		maxPerPage = DEFAULT_MAX_PER_PAGE,
	): this {
		const pageNumber = !page ? 0 : typeof page === "string" ? parseInteger(page, 1) : Math.trunc(page);
		const requested = !limit ? perPage : typeof limit === "string" ? parseInteger(limit, perPage) : Math.trunc(limit);
		const size = Math.min(maxPerPage, Math.max(1, requested));
		this.page = { limit: size, offset: size * (Math.max(1, pageNumber) - 1) };
		return this;
	}

	/**
	 * Unknown fields and directions fall back to the resource's default sort,
	 * each on its own.
	 */
	withSorting(field: string | null | undefined, direction: string | null | undefined = "asc"): this {
		const fallback = this.resource.defaultSort;
		this.sort = {
			field: field && this.resource.sortable.includes(field) ? field : fallback.field,
			direction: isSortOrder(direction) ? direction : fallback.direction,
		};
		return this;
	}

	withProjection(projection: Projection): this {
		this.fields = projection;
		return this;
	}

	/**
	 * Serializes each row from its mapped entity.
	 */
	withSerialization(serialize?: ((entity: A) => unknown) | null, options: SerializationOptions = {}): this {
		this.output = { rowAsRecord: false, serialize: serialize ?? undefined, asMap: options.asMap ?? false };
		return this;
	}

	/**
	 * Serializes each row from the raw stored record, skipping the mapper.
	 */
	withRecordSerialization(
		serialize?: ((row: StoredRecord) => unknown) | null,
		options: SerializationOptions = {},
	): this {
		this.output = { rowAsRecord: true, serialize: serialize ?? undefined, asMap: options.asMap ?? false };
		return this;
	}

	// ==========================================================================
	// Accessors
	// ==========================================================================

	get filtering(): Filter {
		return this.filter;
	}

	get sorting(): ListSort | undefined {
		return this.sort;
	}

	get pagination(): ListPagination | undefined {
		return this.page;
	}

	get projection(): Projection | undefined {
		return this.fields;
	}

	get serialization(): ListSerialization<A> {
		return this.output ?? { rowAsRecord: false, serialize: undefined, asMap: false };
	}

	// ==========================================================================
	// Execution
	// ==========================================================================

	fetchData(): Effect.Effect<ListRows, StorageError, DocumentStore> {
		return executeList(this.resource, this);
	}

	fetchWithCount(): Effect.Effect<ListPage, StorageError, DocumentStore> {
		return executeListWithCount(this.resource, this);
	}
}
