/**
 * Configuration loading with TOML parsing and environment variable interpolation.
 *
 * Searches for config files in the following order:
 * 1. Explicit path (if provided via `--config`)
 * 2. ./reply-drafter.toml (current working directory)
 * 3. ~/.config/reply-drafter/config.toml (XDG config location)
 *
 * @module
 */

import { FileSystem } from "@effect/platform";
import * as TOML from "@iarna/toml";
import { Context, Data, Effect, Schema } from "effect";
import { type AppConfig, AppConfigSchema, type LoginConfig, LoginConfigSchema } from "./schema.js";

// ----------------------------------------------------------------------------
// Error Types
// ----------------------------------------------------------------------------

/**
 * Tagged union of all configuration errors.
 */
export type ConfigError = Data.TaggedEnum<{
	/** No config file found in any of the searched locations */
	ConfigNotFound: { readonly searchedPaths: readonly string[] };
	/** Failed to read the config file (or a referenced secret file) from disk */
	ConfigReadError: { readonly path: string; readonly message: string };
	/** Failed to parse TOML syntax */
	ConfigParseError: { readonly path: string; readonly message: string };
	/** Schema validation failed */
	ConfigValidationError: { readonly path: string; readonly error: unknown };
	/** Environment variable referenced in config is not set */
	MissingEnvVar: { readonly varName: string; readonly path: string };
}>;

export const ConfigError = Data.taggedEnum<ConfigError>();

// ----------------------------------------------------------------------------
// Environment Variable Interpolation
// ----------------------------------------------------------------------------

/**
 * Matches `${VAR_NAME}`; the name is captured in group 1.
 */
const ENV_VAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replaces every `${VAR_NAME}` in `content` with the value of that environment variable.
 * Fails with MissingEnvVar on the first variable that is not set.
 */
export const interpolateEnvVars = (
	content: string,
	path: string,
	env: NodeJS.ProcessEnv = process.env,
): Effect.Effect<string, ConfigError> =>
	Effect.gen(function* () {
		let result = content;

		for (const match of content.matchAll(ENV_VAR_PATTERN)) {
			const varName = match[1];
			if (varName === undefined) {
				continue;
			}

			const value = env[varName];
			if (value === undefined) {
				return yield* Effect.fail(ConfigError.MissingEnvVar({ varName, path }));
			}

			result = result.replace(match[0], value);
		}

		return result;
	});

// ----------------------------------------------------------------------------
// Config File Search
// ----------------------------------------------------------------------------

/**
 * Reads `--config <path>` or `--config=<path>` from command-line arguments.
 */
export const configPathFromArgs = (args: readonly string[]): string | undefined => {
	for (const [index, arg] of args.entries()) {
		if (arg === "--config") {
			return args[index + 1];
		}
		if (arg.startsWith("--config=")) {
			return arg.slice("--config=".length);
		}
	}
	return undefined;
};

const getSearchPaths = (explicitPath?: string): readonly string[] => {
	const paths: string[] = [];

	if (explicitPath !== undefined) {
		paths.push(explicitPath);
	}

	paths.push("./reply-drafter.toml");

	const home = process.env.HOME;
	if (home !== undefined) {
		paths.push(`${home}/.config/reply-drafter/config.toml`);
	}

	return paths;
};

const findConfigFile = (
	explicitPath?: string,
): Effect.Effect<string, ConfigError, FileSystem.FileSystem> =>
	Effect.gen(function* () {
		const fs = yield* FileSystem.FileSystem;
		const searchPaths = getSearchPaths(explicitPath);

		for (const path of searchPaths) {
			// fs.exists can fail with PlatformError, treat errors as "not found"
			const exists = yield* fs.exists(path).pipe(Effect.orElseSucceed(() => false));
			if (exists) {
				return path;
			}
		}

		return yield* Effect.fail(ConfigError.ConfigNotFound({ searchedPaths: searchPaths }));
	});

// ----------------------------------------------------------------------------
// Config Loading
// ----------------------------------------------------------------------------

const parseTOML = (content: string, path: string): Effect.Effect<unknown, ConfigError> =>
	Effect.try({
		try: () => TOML.parse(content),
		catch: (error) =>
			ConfigError.ConfigParseError({
				path,
				message: error instanceof Error ? error.message : String(error),
			}),
	});

const validateConfig = (data: unknown, path: string): Effect.Effect<AppConfig, ConfigError> =>
	Schema.decodeUnknown(AppConfigSchema)(data).pipe(
		Effect.mapError((error) => ConfigError.ConfigValidationError({ path, error })),
	);

/**
 * Finds, reads, interpolates and parses the config file.
 */
const readConfigDocument = (
	explicitPath?: string,
): Effect.Effect<
	{ readonly path: string; readonly data: unknown },
	ConfigError,
	FileSystem.FileSystem
> =>
	Effect.gen(function* () {
		const fs = yield* FileSystem.FileSystem;

		const path = yield* findConfigFile(explicitPath);

		const rawContent = yield* fs.readFileString(path).pipe(
			Effect.mapError((error) =>
				ConfigError.ConfigReadError({
					path,
					message: error.message,
				}),
			),
		);

		const content = yield* interpolateEnvVars(rawContent, path);
		const data = yield* parseTOML(content, path);
		return { path, data };
	});

/**
 * Expands a path that may start with ~ to the user's home directory.
 */
export const expandHomePath = (filePath: string): string => {
	if (filePath.startsWith("~/")) {
		const home = process.env.HOME;
		if (home) {
			return filePath.replace("~", home);
		}
	}
	return filePath;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Secrets that may be given inline or through a `<key>_file` path.
 */
const SECRET_FILE_KEYS: ReadonlyArray<readonly [section: string, key: string]> = [
	["telegram", "session"],
	["completion", "api_key"],
	["server", "dashboard_password"],
];

/**
 * Replaces `<key>_file` references with the trimmed contents of the file,
 * unless the inline `<key>` is already set.
 */
const resolveSecretFiles = (
	data: unknown,
	configPath: string,
): Effect.Effect<unknown, ConfigError, FileSystem.FileSystem> =>
	Effect.gen(function* () {
		const fs = yield* FileSystem.FileSystem;

		if (!isRecord(data)) {
			return data;
		}

		for (const [sectionName, key] of SECRET_FILE_KEYS) {
			const section = data[sectionName];
			if (!isRecord(section)) {
				continue;
			}

			const fileKey = `${key}_file`;
			const secretFile = section[fileKey];
			if (typeof secretFile !== "string" || section[key]) {
				continue;
			}

			const expandedPath = expandHomePath(secretFile);
			const exists = yield* fs.exists(expandedPath).pipe(Effect.orElseSucceed(() => false));
			if (!exists) {
				return yield* Effect.fail(
					ConfigError.ConfigReadError({
						path: configPath,
						message: `${fileKey} not found: ${secretFile}`,
					}),
				);
			}

			section[key] = yield* fs.readFileString(expandedPath).pipe(
				Effect.map((content) => content.trim()),
				Effect.mapError((error) =>
					ConfigError.ConfigReadError({
						path: configPath,
						message: `Failed to read ${fileKey} (${secretFile}): ${error.message}`,
					}),
				),
			);
		}

		return data;
	});

/**
 * Loads and validates the configuration file.
 *
 * Finds the file, reads it, interpolates environment variables, parses the
 * TOML, resolves `*_file` secrets and validates the result against the schema.
 *
 * @example
 * ```ts
 * import { Effect } from "effect"
 * import { NodeContext } from "@effect/platform-node"
 * import { loadConfig } from "./config/loader.js"
 *
 * const program = Effect.gen(function* () {
 *   const config = yield* loadConfig()
 *   yield* Effect.log(config.completion.model)
 * })
 *
 * Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)))
 * ```
 */
export const loadConfig = (
	explicitPath?: string,
): Effect.Effect<AppConfig, ConfigError, FileSystem.FileSystem> =>
	Effect.gen(function* () {
		const { path, data } = yield* readConfigDocument(explicitPath);
		const resolvedData = yield* resolveSecretFiles(data, path);

		return yield* validateConfig(resolvedData, path);
	});

/**
 * Loads the Telegram credentials the login command needs. Secret files are
 * not resolved, since the session file may not exist yet.
 */
export const loadLoginConfig = (
	explicitPath?: string,
): Effect.Effect<LoginConfig, ConfigError, FileSystem.FileSystem> =>
	readConfigDocument(explicitPath).pipe(
		Effect.flatMap(({ path, data }) =>
			Schema.decodeUnknown(LoginConfigSchema)(data).pipe(
				Effect.mapError((error) => ConfigError.ConfigValidationError({ path, error })),
			),
		),
	);

// ----------------------------------------------------------------------------
// Service Tag
// ----------------------------------------------------------------------------

/**
 * Service tag for accessing the loaded configuration.
 */
export class Config extends Context.Tag("reply-drafter/Config")<Config, AppConfig>() {}

/**
 * Renders a ConfigError as the lines printed before the process exits.
 */
export const describeConfigError = (error: ConfigError): readonly string[] => {
	switch (error._tag) {
		case "ConfigNotFound":
			return [
				"Configuration file not found.",
				"Searched paths:",
				...error.searchedPaths.map((path) => `  - ${path}`),
				"",
				"Copy reply-drafter.example.toml to reply-drafter.toml and fill in your credentials.",
			];
		case "ConfigReadError":
			return [`Failed to read config file: ${error.path}`, error.message];
		case "ConfigParseError":
			return [`Failed to parse config file: ${error.path}`, error.message];
		case "ConfigValidationError":
			return [`Invalid configuration in: ${error.path}`, String(error.error)];
		case "MissingEnvVar":
			return [`Missing environment variable: ${error.varName}`, `Referenced in: ${error.path}`];
	}
};
