/**
 * Tests for ListBuilder state: filters from the query string and from the
 * application, pagination clamping and sort fallback.
 */

import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { fieldFilter, fieldMapping, fieldSearch } from "../../src/list/field-filter.js";
import { ListBuilder } from "../../src/list/list-builder.js";
import { defineListResource } from "../../src/list/list-resource.js";
import { recordMapper } from "../../src/repository/mapper.js";
import { matchString } from "../../src/repository/query-helpers.js";
import { makeRepository } from "../../src/repository/repository.js";

const resource = defineListResource({
	repository: makeRepository({ collection: "items", mapper: recordMapper() }),
	filters: {
		status: fieldFilter("status"),
		minPrice: fieldFilter(
			fieldMapping("price", (value) => ({ $gte: value })),
			{ fieldType: "float" },
		),
		active: fieldFilter("active", { fieldType: "bool", default: true }),
		since: fieldFilter(
			fieldMapping("created", (value) => ({ $gte: value })),
			{ fieldType: "date" },
		),
		owner: fieldFilter("owner", { fromQuery: false }),
		q: fieldFilter(fieldSearch(["name", "code"], (value) => matchString(String(value)))),
		kind: fieldFilter("kind", { default: "plain" }),
	},
	sortable: ["name", "price"],
	defaultSort: { field: "name", direction: "desc" },
});

const builder = () => new ListBuilder(resource);

// ============================================================================
// Filtering
// ============================================================================

describe("withQuery", () => {
	it("takes the last value of a parameter", () => {
		expect(builder().withQuery({ status: ["new", "old"] }).filtering).toEqual({ status: "old" });
	});

	it("decodes byte values", () => {
		const bytes = new TextEncoder().encode("new");
		expect(builder().withQuery({ status: [bytes] }).filtering).toEqual({ status: "new" });
	});

	it("ignores filters not open to the query string and unknown parameters", () => {
		expect(builder().withQuery({ owner: ["u1"], unknown: ["1"] }).filtering).toEqual({});
	});

	it("coerces and converts typed values", () => {
		expect(builder().withQuery({ minPrice: ["9.5"], active: ["0"] }).filtering).toEqual({
			price: { $gte: 9.5 },
			active: false,
		});
	});

	it("turns dates into epoch seconds", () => {
		expect(builder().withQuery({ since: ["2024-01-02T00:00:00Z"] }).filtering).toEqual({
			created: { $gte: 1704153600 },
		});
	});

	it("drops values that cannot be parsed when there is no default", () => {
		expect(builder().withQuery({ minPrice: ["cheap"], since: ["soon"] }).filtering).toEqual({});
	});

	it("builds an $or over every searched field", () => {
		expect(builder().withQuery({ q: ["a.b"] }).filtering).toEqual({
			$or: [
				{ name: { $regex: "^a\\.b", $options: "i" } },
				{ code: { $regex: "^a\\.b", $options: "i" } },
			],
		});
	});

	it("emits no search clause for an empty value", () => {
		expect(builder().withQuery({ q: [""] }).filtering).toEqual({});
	});

	it("skips a parameter given without values", () => {
		expect(builder().withQuery({ status: [] }).filtering).toEqual({});
	});
});

describe("withFiltering", () => {
	it("honours filters closed to the query string", () => {
		expect(builder().withFiltering({ owner: "u1" }).filtering).toEqual({ owner: "u1" });
	});

	it("falls back to the declared default for absent values", () => {
		expect(builder().withFiltering({ kind: null, active: undefined }).filtering).toEqual({
			kind: "plain",
			active: true,
		});
	});

	it("accumulates across calls", () => {
		const built = builder().withQuery({ status: ["new"] }).withFiltering({ owner: "u2" });
		expect(built.filtering).toEqual({ status: "new", owner: "u2" });
	});
});

// ============================================================================
// Pagination
// ============================================================================

describe("withPagination", () => {
	it("defaults to the first page of perPage rows", () => {
		expect(builder().withPagination(undefined, undefined).pagination).toEqual({ limit: 50, offset: 0 });
	});

	it("turns a 1-based page into an offset", () => {
		expect(builder().withPagination("3", "10").pagination).toEqual({ limit: 10, offset: 20 });
	});

	it("clamps the limit and the page", () => {
		expect(builder().withPagination("0", "500").pagination).toEqual({ limit: 100, offset: 0 });
		expect(builder().withPagination(3, 500).pagination).toEqual({ limit: 100, offset: 200 });
		expect(builder().withPagination(2, -5, 20, 40).pagination).toEqual({ limit: 1, offset: 1 });
		expect(builder().withPagination(1, 60, 20, 40).pagination).toEqual({ limit: 40, offset: 0 });
	});

	it("falls back on unparseable input", () => {
		expect(builder().withPagination("x", "y").pagination).toEqual({ limit: 50, offset: 0 });
	});

	it("always yields a limit within bounds and a whole-page offset", () => {
		fc.assert(
			fc.property(fc.integer({ min: -1000, max: 1000 }), fc.integer({ min: -1000, max: 1000 }), (page, limit) => {
				const pagination = builder().withPagination(page, limit).pagination;
				if (pagination === undefined) return false;
				return (
					pagination.limit >= 1 &&
					pagination.limit <= 100 &&
					pagination.offset >= 0 &&
					pagination.offset % pagination.limit === 0
				);
			}),
		);
	});
});

// ============================================================================
// Sorting
// ============================================================================

describe("withSorting", () => {
	it("accepts sortable fields and known directions", () => {
		expect(builder().withSorting("price", "desc").sorting).toEqual({ field: "price", direction: "desc" });
		expect(builder().withSorting("price").sorting).toEqual({ field: "price", direction: "asc" });
	});

	it("falls back to the default sort field and direction separately", () => {
		expect(builder().withSorting("secret", "asc").sorting).toEqual({ field: "name", direction: "asc" });
		expect(builder().withSorting("price", "sideways").sorting).toEqual({ field: "price", direction: "desc" });
		expect(builder().withSorting(null, null).sorting).toEqual({ field: "name", direction: "desc" });
	});
});

describe("serialization", () => {
	it("defaults to entities in a list", () => {
		expect(builder().serialization).toEqual({ rowAsRecord: false, serialize: undefined, asMap: false });
	});

	it("records the last serialization chosen", () => {
		const serialization = builder()
			.withSerialization((row) => row._id)
			.withRecordSerialization(null, { asMap: true }).serialization;
		expect(serialization).toEqual({ rowAsRecord: true, serialize: undefined, asMap: true });
	});
});
