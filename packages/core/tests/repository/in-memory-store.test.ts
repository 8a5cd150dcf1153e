/**
 * Tests for the in-memory DocumentStore: filter operators, updates, upserts,
 * sorting, paging and projection.
 */

import { Chunk, Effect, Either, Option, Stream } from "effect";
import { describe, expect, it } from "vitest";
import { StorageError } from "../../src/errors/storage-errors.js";
import { DocumentStore, type FindQuery, type StoredRecord } from "../../src/repository/document-store.js";
import { makeInMemoryDocumentStoreLayer } from "../../src/repository/in-memory-store-layer.js";
import { matchesFilter } from "../../src/repository/query-matcher.js";

const books = (): Array<StoredRecord> => [
	{ _id: "b1", title: "Dune", year: 1965, tags: ["sf", "classic"], meta: { pages: 412 } },
	{ _id: "b2", title: "Neuromancer", year: 1984, tags: ["sf", "cyberpunk"], meta: { pages: 271 } },
	{ _id: "b3", title: "Emma", year: 1815, tags: ["classic"], rating: null },
	{ _id: "b4", title: "dracula", year: 1897, tags: [] },
];

const setup = () => {
	const collections = new Map([["books", books()]]);
	const run = <A, E>(effect: Effect.Effect<A, E, DocumentStore>) =>
		Effect.runPromise(Effect.provide(effect, makeInMemoryDocumentStoreLayer(collections)));
	const find = (query: FindQuery) =>
		run(
			Effect.flatMap(DocumentStore, (store) => Stream.runCollect(store.find("books", query))).pipe(
				Effect.map(Chunk.toReadonlyArray),
			),
		);
	const ids = async (query: FindQuery) => (await find(query)).map((record) => record._id);
	return { collections, run, find, ids };
};

// ============================================================================
// Filters
// ============================================================================

describe("matchesFilter", () => {
	const [dune, neuromancer, emma] = books();

	it("matches equality, array membership and nested paths", () => {
		expect(matchesFilter(dune ?? {}, { title: "Dune" })).toBe(true);
		expect(matchesFilter(dune ?? {}, { tags: "classic" })).toBe(true);
		expect(matchesFilter(dune ?? {}, { "meta.pages": 412 })).toBe(true);
		expect(matchesFilter(neuromancer ?? {}, { tags: "classic" })).toBe(false);
	});

	it("matches null against null and missing fields", () => {
		expect(matchesFilter(emma ?? {}, { rating: null })).toBe(true);
		expect(matchesFilter(dune ?? {}, { rating: null })).toBe(true);
		expect(matchesFilter(dune ?? {}, { rating: { $exists: true } })).toBe(false);
		expect(matchesFilter(emma ?? {}, { rating: { $exists: true } })).toBe(true);
	});

	it("supports comparison operators", () => {
		expect(matchesFilter(dune ?? {}, { year: { $gte: 1965, $lt: 1966 } })).toBe(true);
		expect(matchesFilter(dune ?? {}, { year: { $gt: "1900" } })).toBe(false);
		expect(matchesFilter(dune ?? {}, { year: { $in: [1, 1965] } })).toBe(true);
		expect(matchesFilter(dune ?? {}, { year: { $nin: [1965] } })).toBe(false);
		expect(matchesFilter(dune ?? {}, { year: { $ne: 1984 } })).toBe(true);
		expect(matchesFilter(dune ?? {}, { year: { $not: { $gt: 1900 } } })).toBe(false);
	});

	it("supports regular expressions", () => {
		expect(matchesFilter(dune ?? {}, { title: { $regex: "^du", $options: "i" } })).toBe(true);
		expect(matchesFilter(dune ?? {}, { title: { $regex: "^du" } })).toBe(false);
		expect(matchesFilter(dune ?? {}, { title: /une$/ })).toBe(true);
	});

	it("supports logical operators", () => {
		expect(matchesFilter(dune ?? {}, { $or: [{ year: 1 }, { title: "Dune" }] })).toBe(true);
		expect(matchesFilter(dune ?? {}, { $and: [{ year: 1965 }, { title: "Emma" }] })).toBe(false);
		expect(matchesFilter(dune ?? {}, { $nor: [{ year: 1 }] })).toBe(true);
	});

	it("rejects unknown operators", () => {
		expect(matchesFilter(dune ?? {}, { year: { $near: 1 } })).toBe(false);
	});
});

// ============================================================================
// Reads
// ============================================================================

describe("find", () => {
	it("sorts, skips and limits", async () => {
		const { ids } = setup();
		expect(await ids({ sort: [["year", -1]] })).toEqual(["b2", "b1", "b4", "b3"]);
		expect(await ids({ sort: [["year", 1]], skip: 1, limit: 2 })).toEqual(["b4", "b1"]);
	});

	it("orders strings by code point", async () => {
		const { ids } = setup();
		expect(await ids({ sort: [["title", 1]] })).toEqual(["b1", "b3", "b2", "b4"]);
	});

	it("projects by inclusion and exclusion", async () => {
		const { find } = setup();
		expect(await find({ filter: { _id: "b1" }, projection: { title: true } })).toEqual([
			{ _id: "b1", title: "Dune" },
		]);
		expect(await find({ filter: { _id: "b1" }, projection: { title: true, _id: false } })).toEqual([
			{ title: "Dune" },
		]);
		expect(await find({ filter: { _id: "b3" }, projection: { tags: false, rating: false } })).toEqual([
			{ _id: "b3", title: "Emma", year: 1815 },
		]);
	});

	it("returns copies", async () => {
		const { find, collections } = setup();
		const [first] = await find({ filter: { _id: "b1" } });
		if (first !== undefined) first.title = "changed";
		expect(collections.get("books")?.[0]?.title).toBe("Dune");
	});

	it("finds one record and counts", async () => {
		const { run } = setup();
		const found = await run(
			Effect.flatMap(DocumentStore, (store) => store.findOne("books", { tags: "sf" }, { sort: [["year", -1]] })),
		);
		expect(Option.getOrNull(found)?._id).toBe("b2");
		const count = await run(Effect.flatMap(DocumentStore, (store) => store.count("books", { tags: "classic" })));
		expect(count).toBe(2);
	});
});

// ============================================================================
// Writes
// ============================================================================

describe("writes", () => {
	it("inserts with a generated id and rejects duplicates", async () => {
		const { run, collections } = setup();
		const { insertedId } = await run(
			Effect.flatMap(DocumentStore, (store) => store.insertOne("authors", { name: "Le Guin" })),
		);
		expect(typeof insertedId).toBe("string");
		expect(collections.get("authors")).toEqual([{ _id: insertedId, name: "Le Guin" }]);

		const duplicate = await run(
			Effect.either(Effect.flatMap(DocumentStore, (store) => store.insertOne("books", { _id: "b1" }))),
		);
		expect(Either.isLeft(duplicate)).toBe(true);
		if (Either.isLeft(duplicate)) {
			expect(duplicate.left).toBeInstanceOf(StorageError);
			expect(duplicate.left.message).toBe("Duplicate key error: _id b1 already exists in books");
		}
	});

	it("applies $set, $unset and $inc", async () => {
		const { run, collections } = setup();
		const result = await run(
			Effect.flatMap(DocumentStore, (store) =>
				store.updateOne("books", { _id: "b1" }, { $set: { "meta.pages": 500 }, $unset: { tags: "" }, $inc: { year: 1 } }),
			),
		);
		expect(result).toEqual({ matched: 1, modified: 1, upsertedId: null });
		expect(collections.get("books")?.[0]).toEqual({ _id: "b1", title: "Dune", year: 1966, meta: { pages: 500 } });
	});

	it("updates many records", async () => {
		const { run, collections } = setup();
		const result = await run(
			Effect.flatMap(DocumentStore, (store) => store.updateMany("books", { tags: "sf" }, { $set: { shelf: 2 } })),
		);
		expect(result.matched).toBe(2);
		expect(collections.get("books")?.filter((book) => book.shelf === 2).length).toBe(2);
	});

	it("upserts from the filter and $setOnInsert", async () => {
		const { run, collections } = setup();
		const result = await run(
			Effect.flatMap(DocumentStore, (store) =>
				store.updateOne(
					"books",
					{ _id: "b9", year: { $eq: 2000 } },
					{ $set: { title: "New" }, $setOnInsert: { created: true } },
					{ upsert: true },
				),
			),
		);
		expect(result).toEqual({ matched: 0, modified: 0, upsertedId: "b9" });
		expect(collections.get("books")?.[4]).toEqual({ _id: "b9", year: 2000, title: "New", created: true });
	});

	it("returns the record before or after findOneAndUpdate", async () => {
		const { run } = setup();
		const before = await run(
			Effect.flatMap(DocumentStore, (store) => store.findOneAndUpdate("books", { _id: "b3" }, { $set: { year: 1816 } })),
		);
		expect(Option.getOrNull(before)?.year).toBe(1815);

		const after = await run(
			Effect.flatMap(DocumentStore, (store) =>
				store.findOneAndUpdate("books", { _id: "b3" }, { $inc: { year: 1 } }, { returnDocument: "after" }),
			),
		);
		expect(Option.getOrNull(after)?.year).toBe(1817);

		const missing = await run(
			Effect.flatMap(DocumentStore, (store) => store.findOneAndUpdate("books", { _id: "nope" }, { $set: { a: 1 } })),
		);
		expect(Option.isNone(missing)).toBe(true);
	});

	it("replaces everything but _id for an update without operators", async () => {
		const { run, collections } = setup();
		await run(Effect.flatMap(DocumentStore, (store) => store.updateOne("books", { _id: "b4" }, { title: "Dracula" })));
		expect(collections.get("books")?.[3]).toEqual({ _id: "b4", title: "Dracula" });
	});

	it("deletes one or many", async () => {
		const { run, collections } = setup();
		const one = await run(Effect.flatMap(DocumentStore, (store) => store.deleteOne("books", { tags: "classic" })));
		expect(one).toEqual({ deleted: 1 });
		expect(collections.get("books")?.map((book) => book._id)).toEqual(["b2", "b3", "b4"]);
		const many = await run(Effect.flatMap(DocumentStore, (store) => store.deleteMany("books", {})));
		expect(many).toEqual({ deleted: 3 });
		expect(collections.get("books")).toEqual([]);
	});
});
