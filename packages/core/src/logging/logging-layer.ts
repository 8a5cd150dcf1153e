import { Config, type ConfigError, Effect, Layer, Logger } from "effect";
import { type LogFormat, LoggingConfig } from "../config/app-config.js";

const loggerFor = (format: LogFormat): Layer.Layer<never> => {
	switch (format) {
		case "json":
			return Logger.json;
		case "logfmt":
			return Logger.logFmt;
		case "pretty":
			return Logger.pretty;
	}
};

/**
 * Replaces the default logger with the configured formatter and drops
 * messages below the configured level.
 */
export const makeLoggingLayer = (config: LoggingConfig): Layer.Layer<never> =>
	Layer.merge(loggerFor(config.format), Logger.minimumLogLevel(config.level));

/**
 * Logging configured from the `logging` section of the current ConfigProvider.
 */
export const LoggingLive: Layer.Layer<never, ConfigError.ConfigError> = Layer.unwrapEffect(
	Effect.map(Config.nested(LoggingConfig, "logging"), makeLoggingLayer),
);
