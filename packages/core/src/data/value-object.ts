/**
 * Value objects: classes with a declared, ordered set of data fields.
 *
 * Subclasses initialise each field and list their names in `fieldNames`:
 *
 * ```ts
 * class Address extends ValueObject {
 *   city: string | null = null
 *   country: string | null = null
 *   fieldNames() { return ["city", "country"] as const }
 * }
 * ```
 *
 * @module
 */

export abstract class ValueObject {
	/**
	 * Declared data fields, in order. Only these are read, written, compared
	 * and serialised.
	 */
	abstract fieldNames(): ReadonlyArray<string>;

	get(field: string): unknown {
		return this.fieldNames().includes(field) ? Reflect.get(this, field) : undefined;
	}

	/**
	 * Writes every declared field present in `changes`; other keys are ignored.
	 */
	update(changes: Readonly<Record<string, unknown>>): this {
		for (const field of this.fieldNames()) {
			if (field in changes) Reflect.set(this, field, changes[field]);
		}
		return this;
	}

	toRecord(fields?: ReadonlyArray<string>): Record<string, unknown> {
		const names = fields ?? this.fieldNames();
		const record: Record<string, unknown> = {};
		for (const field of names) {
			record[field] = this.get(field);
		}
		return record;
	}

	toJSON(): Record<string, unknown> {
		return this.toRecord();
	}

	/**
	 * Field-by-field equality against another value object or a plain record
	 * holding exactly the declared fields.
	 */
	equals(other: unknown): boolean {
		const names = this.fieldNames();
		if (other instanceof ValueObject) {
			return (
				other.constructor === this.constructor &&
				names.every((field) => this.get(field) === other.get(field))
			);
		}
		if (typeof other !== "object" || other === null) return false;
		const keys = Object.keys(other);
		return (
			keys.length === names.length &&
			names.every((field) => field in other && this.get(field) === Reflect.get(other, field))
		);
	}

	static fromRecord<T extends ValueObject>(
		this: new () => T,
		data: Readonly<Record<string, unknown>> = {},
	): T {
		return new this().update(data);
	}

	/**
	 * Copies the fields both classes declare from another value object.
	 */
	static fromObject<T extends ValueObject>(this: new () => T, source: ValueObject): T {
		const target = new this();
		const shared = target.fieldNames().filter((field) => source.fieldNames().includes(field));
		return target.update(source.toRecord(shared));
	}
}
