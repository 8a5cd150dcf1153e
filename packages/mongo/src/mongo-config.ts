import { Config } from "effect";

/**
 * Connection settings, read from the `mongo` section of the current
 * ConfigProvider (`MONGO_URI`, `MONGO_DATABASE` from the environment).
 * `database` has no default.
 */
export const MongoConfig = Config.all({
	uri: Config.string("uri").pipe(Config.withDefault("mongodb://localhost:27017")),
	database: Config.string("database"),
	appName: Config.option(Config.string("appName")),
}).pipe(Config.nested("mongo"));

export type MongoConfig = Config.Config.Success<typeof MongoConfig>;
