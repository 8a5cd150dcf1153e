import type { Filter, StoredRecord } from "../repository/document-store.js";
import type { Repository } from "../repository/repository.js";
import type { FieldFilter } from "./field-filter.js";

export type SortOrder = "asc" | "desc";

export interface ListSort {
	readonly field: string;
	readonly direction: SortOrder;
}

export interface ListPagination {
	readonly limit: number;
	readonly offset: number;
}

/**
 * How fetched rows are turned into output. With `rowAsRecord` the serializer
 * sees the raw record, otherwise the mapped entity. Without a serializer the
 * record or entity itself is returned. `asMap` keys the output by id.
 */
export type ListSerialization<A> =
	| {
			readonly rowAsRecord: false;
			readonly serialize: ((entity: A) => unknown) | undefined;
			readonly asMap: boolean;
	  }
	| {
			readonly rowAsRecord: true;
			readonly serialize: ((row: StoredRecord) => unknown) | undefined;
			readonly asMap: boolean;
	  };

/**
 * Static description of a listable resource.
 */
export interface ListResource<A> {
	readonly repository: Repository<A>;
	/**
	 * Declared filters, keyed by their input name.
	 */
	readonly filters: Readonly<Record<string, FieldFilter>>;
	readonly sortable: ReadonlyArray<string>;
	readonly defaultSort: ListSort;
	/**
	 * Last rewrite of the filter before it is sent to the store.
	 */
	readonly postProcessFiltering?: (filter: Filter) => Filter;
}

export const defineListResource = <A>(resource: ListResource<A>): ListResource<A> => resource;
