export {
	AppConfig,
	CorsConfig,
	DEFAULT_ALLOWED_HEADERS,
	ListConfig,
	LocaleConfig,
	LogFormat,
	LoggingConfig,
	WebConfig,
} from "./app-config.js";
export { envConfigProvider, jsonWithEnvFallback, loadJsonConfigProvider } from "./config-provider.js";
