import { defineSchema, requiredField, rule, Val } from "@restdoc/core";
import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";
import { HttpError } from "../src/http-error.js";
import {
	parseJsonBody,
	queryParam,
	requireJsonContent,
	toRawQuery,
	tryParseUuid,
	validateBody,
} from "../src/request.js";

const failureOf = <A>(effect: Effect.Effect<A, HttpError>): HttpError | undefined =>
	Either.match(Effect.runSync(Effect.either(effect)), {
		onLeft: (error) => error,
		onRight: () => undefined,
	});

describe("parseJsonBody", () => {
	it("treats a missing or empty body as an empty object", () => {
		expect(Effect.runSync(parseJsonBody(undefined))).toEqual({});
		expect(Effect.runSync(parseJsonBody(null))).toEqual({});
		expect(Effect.runSync(parseJsonBody(""))).toEqual({});
		expect(Effect.runSync(parseJsonBody(new Uint8Array()))).toEqual({});
	});

	it("parses text and UTF-8 bytes", () => {
		expect(Effect.runSync(parseJsonBody('{"name":"Zoë"}'))).toEqual({ name: "Zoë" });
		expect(Effect.runSync(parseJsonBody(new TextEncoder().encode("[1,2]")))).toEqual([1, 2]);
	});

	it("rejects malformed JSON with INVALID_CONTENT", () => {
		const error = failureOf(parseJsonBody("{name"));
		expect(error).toBeInstanceOf(HttpError);
		expect(error?.status).toBe(400);
		expect(error?.code).toBe(4004);
	});
});

describe("requireJsonContent", () => {
	it("rejects write requests without a JSON content type", () => {
		const error = failureOf(requireJsonContent("post", "text/plain"));
		expect(error?.status).toBe(406);
		expect(error?.code).toBe(4004);
	});

	it("accepts JSON writes and any read", () => {
		expect(failureOf(requireJsonContent("PUT", "application/json; charset=UTF-8"))).toBeUndefined();
		expect(failureOf(requireJsonContent("GET", undefined))).toBeUndefined();
	});
});

describe("validateBody", () => {
	const schema = defineSchema([rule(requiredField("name"), Val.string({ minLen: 2 })), rule("age", Val.number())]);

	it("succeeds with the accepted values and passes other fields through", () => {
		expect(Effect.runSync(validateBody({ name: "Ann", age: 30, extra: true }, schema))).toEqual({
			name: "Ann",
			age: 30,
			extra: true,
		});
	});

	it("fails with VALIDATION_ERROR and the field errors", () => {
		const error = failureOf(validateBody({ name: "A" }, schema));
		expect(error?.status).toBe(400);
		expect(error?.code).toBe(4008);
		expect(error?.details).toEqual({ name: { code: 11, message: "Value is too short. Min length 2" } });
	});

	it("reports a missing required field", () => {
		const error = failureOf(validateBody({}, schema));
		expect(error?.details).toEqual({ name: { code: 5, message: "Missing required value" } });
	});

	it("rejects a body that is not an object", () => {
		const error = failureOf(validateBody([1, 2], schema));
		expect(error?.status).toBe(400);
		expect(error?.code).toBe(4004);
	});
});

describe("tryParseUuid", () => {
	it("returns the canonical form", () => {
		expect(Effect.runSync(tryParseUuid("{3F2504E0-4F89-41D3-9A0C-0305E82C3301}"))).toBe(
			"3f2504e0-4f89-41d3-9a0c-0305e82c3301",
		);
	});

	it("fails with BAD_UUID", () => {
		const error = failureOf(tryParseUuid("not-a-uuid"));
		expect(error?.status).toBe(400);
		expect(error?.code).toBe(4009);
		expect(error?.message).toBe("Badly formed uuid");
	});
});

describe("toRawQuery and queryParam", () => {
	const query = { page: "2", tag: ["a", "b"], missing: undefined };

	it("wraps single values and drops missing ones", () => {
		expect(toRawQuery(query)).toEqual({ page: ["2"], tag: ["a", "b"] });
	});

	it("reads the last value", () => {
		expect(queryParam(query, "tag")).toBe("b");
		expect(queryParam(query, "page")).toBe("2");
		expect(queryParam(query, "missing")).toBeUndefined();
		expect(queryParam({ tag: [] }, "tag")).toBeUndefined();
	});
});
