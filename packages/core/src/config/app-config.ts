import { Config, LogLevel } from "effect";

// ============================================================================
// Config descriptors
// ============================================================================
//
// Each section is read relative to its own prefix (`web.port`, `cors.allowedOrigin`,
// and so on); `AppConfig` nests them all. With the environment provider the
// keys are upper-cased: WEB_PORT, LOGGING_LEVEL.

export const WebConfig = Config.all({
	name: Config.string("name").pipe(Config.withDefault("Rest API Server")),
	port: Config.integer("port").pipe(Config.withDefault(8080)),
	host: Config.string("host").pipe(Config.withDefault("0.0.0.0")),
});
export type WebConfig = Config.Config.Success<typeof WebConfig>;

export const LogFormat = Config.literal("pretty", "json", "logfmt");
export type LogFormat = Config.Config.Success<ReturnType<typeof LogFormat>>;

export const LoggingConfig = Config.all({
	level: Config.logLevel("level").pipe(Config.withDefault(LogLevel.Debug)),
	format: LogFormat("format").pipe(Config.withDefault<LogFormat>("pretty")),
});
export type LoggingConfig = Config.Config.Success<typeof LoggingConfig>;

export const DEFAULT_ALLOWED_HEADERS: ReadonlyArray<string> = [
	"X-Lang",
	"Content-Type",
	"Authorization",
	"X-Filename",
	"x-requested-with",
];

export const CorsConfig = Config.all({
	allowedOrigin: Config.array(Config.string(), "allowedOrigin").pipe(Config.withDefault<Array<string>>(["*"])),
	allowedHeaders: Config.array(Config.string(), "allowedHeaders").pipe(
		Config.withDefault([...DEFAULT_ALLOWED_HEADERS]),
	),
});
export type CorsConfig = Config.Config.Success<typeof CorsConfig>;

export const LocaleConfig = Config.all({
	defaultLocale: Config.string("defaultLocale").pipe(Config.withDefault("en_EN")),
	defaultCountry: Config.string("defaultCountry").pipe(Config.withDefault("POL")),
	defaultTimezone: Config.string("defaultTimezone").pipe(Config.withDefault("GMT")),
});
export type LocaleConfig = Config.Config.Success<typeof LocaleConfig>;

export const ListConfig = Config.all({
	perPage: Config.integer("perPage").pipe(Config.withDefault(50)),
	maxPerPage: Config.integer("maxPerPage").pipe(Config.withDefault(100)),
});
export type ListConfig = Config.Config.Success<typeof ListConfig>;

export const AppConfig = Config.all({
	web: Config.nested(WebConfig, "web"),
	logging: Config.nested(LoggingConfig, "logging"),
	cors: Config.nested(CorsConfig, "cors"),
	locale: Config.nested(LocaleConfig, "locale"),
	list: Config.nested(ListConfig, "list"),
});
export type AppConfig = Config.Config.Success<typeof AppConfig>;
