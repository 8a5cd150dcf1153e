import { ConfigProvider, Effect, Either, Option } from "effect";
import { describe, expect, it } from "vitest";
import { MongoConfig } from "../src/mongo-config.js";
import { toDocument, toFindOptions, toSortSpec } from "../src/mongo-store-layer.js";

describe("toSortSpec", () => {
	it("keeps field order as precedence", () => {
		const spec = toSortSpec([
			["createdAt", -1],
			["name", 1],
		]);
		expect(spec).toEqual({ createdAt: -1, name: 1 });
		expect(Object.keys(spec)).toEqual(["createdAt", "name"]);
	});

	it("returns an empty document for no sort keys", () => {
		expect(toSortSpec([])).toEqual({});
	});
});

describe("toFindOptions", () => {
	it("maps sort, limit, skip and projection", () => {
		const options = toFindOptions({
			sort: [["name", 1]],
			limit: 20,
			skip: 40,
			projection: { name: true, email: true },
		});
		expect(options).toEqual({
			sort: { name: 1 },
			limit: 20,
			skip: 40,
			projection: { name: true, email: true },
		});
	});

	it("leaves out empty and zero settings", () => {
		expect(toFindOptions({ sort: [], limit: 0, skip: 0, projection: {} })).toEqual({});
		expect(toFindOptions({})).toEqual({});
	});
});

describe("toDocument", () => {
	it("copies every entry", () => {
		const record = { _id: "a1", tags: { $in: ["x"] } };
		const document = toDocument(record);
		expect(document).toEqual(record);
		expect(document).not.toBe(record);
	});
});

describe("MongoConfig", () => {
	const load = (entries: ReadonlyArray<readonly [string, string]>) =>
		Effect.runSync(
			Effect.either(
				Effect.withConfigProvider(MongoConfig, ConfigProvider.fromMap(new Map(entries))),
			),
		);

	it("defaults the uri", () => {
		const result = load([["mongo.database", "shop"]]);
		expect(Either.isRight(result)).toBe(true);
		if (Either.isRight(result)) {
			expect(result.right.uri).toBe("mongodb://localhost:27017");
			expect(result.right.database).toBe("shop");
			expect(Option.isNone(result.right.appName)).toBe(true);
		}
	});

	it("reads every setting", () => {
		const result = load([
			["mongo.uri", "mongodb://db.test:27018"],
			["mongo.database", "shop"],
			["mongo.appName", "orders"],
		]);
		const config = Either.getOrThrow(result);
		expect(config.uri).toBe("mongodb://db.test:27018");
		expect(config.database).toBe("shop");
		expect(Option.getOrNull(config.appName)).toBe("orders");
	});

	it("fails without a database", () => {
		expect(Either.isLeft(load([]))).toBe(true);
	});
});
