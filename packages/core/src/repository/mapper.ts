import type { Document } from "../data/document.js";
import type { StoredRecord } from "./document-store.js";

/**
 * Converts between stored records and the entities a repository hands out.
 */
export interface Mapper<A> {
	readonly idField: string;
	readonly serialize: (entity: A, fields?: ReadonlyArray<string>) => StoredRecord;
	readonly deserialize: (record: Readonly<StoredRecord>) => A;
}

/**
 * Maps a Document subclass, storing `uuid` as `_id`.
 */
export const documentMapper = <D extends Document>(create: new () => D): Mapper<D> => ({
	idField: "_id",
	serialize: (entity, fields) => {
		const { uuid: _uuid, ...record } = entity.toRecord(fields);
		return { ...record, _id: entity.uuid };
	},
	deserialize: (record) => {
		const entity = new create().update(record);
		const id = record._id;
		if (id !== undefined && id !== null) entity.uuid = String(id);
		return entity;
	},
});

/**
 * Pass-through mapper for repositories that work on raw records.
 */
export const recordMapper = (idField = "_id"): Mapper<StoredRecord> => ({
	idField,
	serialize: (entity, fields) =>
		fields === undefined
			? { ...entity }
			: Object.fromEntries(fields.filter((field) => field in entity).map((field) => [field, entity[field]])),
	deserialize: (record) => ({ ...record }),
});
