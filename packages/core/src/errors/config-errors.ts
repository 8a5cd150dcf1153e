import { Data } from "effect";

export class ConfigLoadError extends Data.TaggedError("ConfigLoadError")<{
	readonly path: string;
	readonly reason: "not_found" | "parse_error" | "invalid_shape";
	readonly message: string;
	readonly cause?: unknown;
}> {}
