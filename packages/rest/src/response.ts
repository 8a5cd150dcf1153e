import type { CorsConfig } from "@restdoc/core";

export interface RestResponse {
	readonly status: number;
	readonly body: unknown;
	readonly headers?: Readonly<Record<string, string>>;
}

export type ResponseHeaders = Record<string, string>;

const utf8 = new TextDecoder("utf-8");

/**
 * Success response. The body gets `status: "OK"`, plus `totalCount` when one
 * is given.
 */
export const okResponse = (
	body?: Readonly<Record<string, unknown>> | null,
	totalCount?: number,
	status = 200,
): RestResponse => {
	const response: Record<string, unknown> = body ? { ...body, status: "OK" } : { status: "OK" };
	if (totalCount !== undefined) response.totalCount = Math.trunc(totalCount);
	return { status, body: response };
};

// ============================================================================
// CORS
// ============================================================================

/**
 * CORS headers for a request from `origin`. A listed origin is echoed back;
 * an unlisted one gets the first listed origin.
 */
export const corsHeaders = (config: CorsConfig, origin?: string): ResponseHeaders => {
	const headers: ResponseHeaders = {};
	const allowed = config.allowedOrigin;
	const [first] = allowed;
	if (allowed.length === 1 && first === "*") {
		headers["Access-Control-Allow-Origin"] = "*";
	} else if (origin !== undefined && origin !== "" && first !== undefined) {
		headers["Access-Control-Allow-Origin"] = allowed.includes(origin) ? origin : first;
	}
	if (config.allowedHeaders.length > 0) {
		headers["Access-Control-Allow-Headers"] = config.allowedHeaders.join(", ");
	}
	headers["Access-Control-Max-Age"] = "86400";
	headers["Access-Control-Allow-Credentials"] = "true";
	return headers;
};

/**
 * Answer to a preflight request.
 */
export const optionsResponse = (config: CorsConfig, origin?: string): RestResponse => ({
	status: 204,
	body: null,
	headers: { ...corsHeaders(config, origin), "Access-Control-Allow-Methods": "GET, POST, DELETE, PUT" },
});

// ============================================================================
// JSON encoding
// ============================================================================

const encodeValue = (_key: string, value: unknown): unknown => {
	if (value instanceof Set) return Array.from(value);
	if (value instanceof Uint8Array) return utf8.decode(value);
	return value;
};

/**
 * JSON text of a response body. Ids, dates and value objects go through their
 * own `toJSON`;
 * sets become arrays and bytes UTF-8 text. `</` is escaped so the output can
 * sit inside a script tag.
 */
export const encodeJson = (body: unknown): string =>
	(JSON.stringify(body, encodeValue) ?? "null").replace(/<\//g, "<\\/");
