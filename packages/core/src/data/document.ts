import { randomUUID } from "node:crypto";
import { ValueObject } from "./value-object.js";

export const generateId = (): string => randomUUID();

/**
 * A value object with an identity. A fresh `uuid` is assigned on creation;
 * repositories store it as the record's `_id`. `uuid` is not listed in
 * `fieldNames()`.
 */
export abstract class Document extends ValueObject {
	uuid: string = generateId();

	override toRecord(fields?: ReadonlyArray<string>): Record<string, unknown> {
		return fields === undefined ? { uuid: this.uuid, ...super.toRecord() } : super.toRecord(fields);
	}

	override equals(other: unknown): boolean {
		return super.equals(other) && (!(other instanceof Document) || other.uuid === this.uuid);
	}
}
