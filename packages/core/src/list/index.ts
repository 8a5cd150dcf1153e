export type { FieldFilter, FieldMapping, FieldSearch, FieldType, FilterConverter } from "./field-filter.js";
export { coerceFilterValue, fieldFilter, fieldMapping, fieldSearch } from "./field-filter.js";
export type {
	ListPagination,
	ListResource,
	ListSerialization,
	ListSort,
	SortOrder,
} from "./list-resource.js";
export { defineListResource } from "./list-resource.js";
export type { RawQuery, SerializationOptions } from "./list-builder.js";
export { ListBuilder } from "./list-builder.js";
export type { ListPage, ListRows } from "./list-command.js";
export { executeList, executeListWithCount, toFindQuery } from "./list-command.js";
