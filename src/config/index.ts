/**
 * Configuration module.
 *
 * Provides TOML-based configuration loading with:
 * - Effect Schema validation
 * - Environment variable interpolation (${VAR_NAME} syntax)
 * - `*_file` indirection for secrets
 * - Multiple search paths (--config > ./reply-drafter.toml > ~/.config/reply-drafter/config.toml)
 *
 * @module
 */

export {
	type AppConfig,
	AppConfigSchema,
	type CompletionConfig,
	type DashboardCredentials,
	type DefaultsConfig,
	type LoggingConfig,
	type LoginConfig,
	type PromptsConfig,
	type ServerConfig,
	type StorageConfig,
	type TelegramConfig,
	getDashboardCredentials,
} from "./schema.js";

export {
	Config,
	ConfigError,
	configPathFromArgs,
	describeConfigError,
	expandHomePath,
	interpolateEnvVars,
	loadConfig,
	loadLoginConfig,
} from "./loader.js";
