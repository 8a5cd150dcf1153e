import * as fs from "node:fs";
import { ConfigProvider, Effect } from "effect";
import { ConfigLoadError } from "../errors/config-errors.js";

/**
 * Environment variables, with nested keys joined by `_` and upper-cased
 * (`web.port` is read from `WEB_PORT`).
 */
export const envConfigProvider = (): ConfigProvider.ConfigProvider =>
	ConfigProvider.fromEnv().pipe(ConfigProvider.constantCase);

const isJsonObject = (value: unknown): value is object =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Reads a JSON config file into a ConfigProvider. Sections are top-level
 * objects (`{ "web": { "port": 9000 } }`).
 */
export const loadJsonConfigProvider = (
	configPath: string,
): Effect.Effect<ConfigProvider.ConfigProvider, ConfigLoadError> =>
	Effect.gen(function* () {
		const content = yield* Effect.try({
			try: () => fs.readFileSync(configPath, "utf-8"),
			catch: (cause) =>
				new ConfigLoadError({
					path: configPath,
					reason: "not_found",
					message: `Cannot read config file ${configPath}`,
					cause,
				}),
		});
		const parsed: unknown = yield* Effect.try({
			try: () => JSON.parse(content),
			catch: (cause) =>
				new ConfigLoadError({
					path: configPath,
					reason: "parse_error",
					message: `Config file ${configPath} is not valid JSON`,
					cause,
				}),
		});
		if (!isJsonObject(parsed)) {
			return yield* Effect.fail(
				new ConfigLoadError({
					path: configPath,
					reason: "invalid_shape",
					message: `Config file ${configPath} must contain a JSON object`,
				}),
			);
		}
		return ConfigProvider.fromJson(parsed);
	});

/**
 * A JSON file backed by the environment for anything the file leaves out.
 */
export const jsonWithEnvFallback = (
	configPath: string,
): Effect.Effect<ConfigProvider.ConfigProvider, ConfigLoadError> =>
	Effect.map(loadJsonConfigProvider(configPath), (provider) =>
		ConfigProvider.orElse(provider, envConfigProvider),
	);
