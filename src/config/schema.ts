/**
 * Effect Schema definitions for reply-drafter configuration.
 *
 * The TOML file uses snake_case (standard for TOML), while TypeScript
 * uses camelCase. The schemas handle this transformation automatically.
 *
 * @module
 */

import { ParseResult, type Redacted, Schema } from "effect";
import {
	CooldownMinutes,
	MaxPendingPerChat,
	MessagesPerCycle,
	PollIntervalMinutes,
} from "../domain/settings.js";

const PositiveInt = Schema.Int.pipe(Schema.positive());

/**
 * Schema for the Telegram section.
 * Supports either session (inline) or session_file (path to file); the loader
 * resolves session_file to session before validation.
 */
export const TelegramConfigSchema = Schema.transformOrFail(
	Schema.Struct({
		api_id: PositiveInt,
		api_hash: Schema.String,
		session: Schema.optional(Schema.String),
		session_file: Schema.optional(Schema.String),
		timeout_seconds: Schema.optionalWith(PositiveInt, { default: () => 20 }),
		dialogs_limit: Schema.optionalWith(PositiveInt, { default: () => 100 }),
	}),
	Schema.Struct({
		apiId: PositiveInt,
		apiHash: Schema.Redacted(Schema.String),
		session: Schema.Redacted(Schema.String),
		timeoutSeconds: PositiveInt,
		dialogsLimit: PositiveInt,
	}),
	{
		strict: true,
		decode: (from, _, ast) =>
			from.session === undefined || from.session.length === 0
				? ParseResult.fail(
						new ParseResult.Type(
							ast,
							from,
							"Telegram session is required. Provide either session or session_file.",
						),
					)
				: ParseResult.succeed({
						apiId: from.api_id,
						apiHash: from.api_hash,
						session: from.session,
						timeoutSeconds: from.timeout_seconds,
						dialogsLimit: from.dialogs_limit,
					}),
		encode: (to) =>
			ParseResult.succeed({
				api_id: to.apiId,
				api_hash: to.apiHash,
				session: to.session,
				timeout_seconds: to.timeoutSeconds,
				dialogs_limit: to.dialogsLimit,
			}),
	},
);

export type TelegramConfig = typeof TelegramConfigSchema.Type;

/**
 * What the login command reads from the config file. Unlike the full schema
 * it needs no session; `session_file`, when set, is where a new one is saved.
 */
export const LoginConfigSchema = Schema.transform(
	Schema.Struct({
		telegram: Schema.Struct({
			api_id: PositiveInt,
			api_hash: Schema.String,
			phone: Schema.optional(Schema.String),
			session_file: Schema.optional(Schema.String),
		}),
	}),
	Schema.Struct({
		apiId: PositiveInt,
		apiHash: Schema.Redacted(Schema.String),
		phone: Schema.optional(Schema.String),
		sessionFile: Schema.optional(Schema.String),
	}),
	{
		strict: true,
		decode: ({ telegram }) => ({
			apiId: telegram.api_id,
			apiHash: telegram.api_hash,
			phone: telegram.phone,
			sessionFile: telegram.session_file,
		}),
		encode: (login) => ({
			telegram: {
				api_id: login.apiId,
				api_hash: login.apiHash,
				phone: login.phone,
				session_file: login.sessionFile,
			},
		}),
	},
);

export type LoginConfig = typeof LoginConfigSchema.Type;

/**
 * Schema for the completion (OpenAI-compatible) section.
 * api_key_file is resolved by the loader in the same way as session_file.
 */
export const CompletionConfigSchema = Schema.transformOrFail(
	Schema.Struct({
		api_key: Schema.optional(Schema.String),
		api_key_file: Schema.optional(Schema.String),
		model: Schema.optionalWith(Schema.String, { default: () => "gpt-4o-mini" }),
		base_url: Schema.optionalWith(Schema.String, { default: () => "https://api.openai.com/v1" }),
		timeout_seconds: Schema.optionalWith(PositiveInt, { default: () => 30 }),
		temperature: Schema.optionalWith(Schema.Number.pipe(Schema.between(0, 2)), {
			default: () => 0.7,
		}),
		max_output_tokens: Schema.optionalWith(PositiveInt, { default: () => 600 }),
	}),
	Schema.Struct({
		apiKey: Schema.Redacted(Schema.String),
		model: Schema.String,
		baseUrl: Schema.String,
		timeoutSeconds: PositiveInt,
		temperature: Schema.Number,
		maxOutputTokens: PositiveInt,
	}),
	{
		strict: true,
		decode: (from, _, ast) =>
			from.api_key === undefined || from.api_key.length === 0
				? ParseResult.fail(
						new ParseResult.Type(
							ast,
							from,
							"Completion api_key is required. Provide either api_key or api_key_file.",
						),
					)
				: ParseResult.succeed({
						apiKey: from.api_key,
						model: from.model,
						baseUrl: from.base_url.replace(/\/+$/, ""),
						timeoutSeconds: from.timeout_seconds,
						temperature: from.temperature,
						maxOutputTokens: from.max_output_tokens,
					}),
		encode: (to) =>
			ParseResult.succeed({
				api_key: to.apiKey,
				model: to.model,
				base_url: to.baseUrl,
				timeout_seconds: to.timeoutSeconds,
				temperature: to.temperature,
				max_output_tokens: to.maxOutputTokens,
			}),
	},
);

export type CompletionConfig = typeof CompletionConfigSchema.Type;

/**
 * Schema for the HTTP server section.
 * Basic auth is enabled only when both dashboard credentials are present.
 */
export const ServerConfigSchema = Schema.transform(
	Schema.Struct({
		port: Schema.optionalWith(Schema.Int.pipe(Schema.between(1, 65535)), { default: () => 8000 }),
		dashboard_username: Schema.optional(Schema.String),
		dashboard_password: Schema.optional(Schema.String),
		dashboard_password_file: Schema.optional(Schema.String),
	}),
	Schema.Struct({
		port: Schema.Int,
		dashboardUsername: Schema.optional(Schema.String),
		dashboardPassword: Schema.optional(Schema.Redacted(Schema.String)),
	}),
	{
		strict: true,
		decode: (from) => ({
			port: from.port,
			dashboardUsername: from.dashboard_username,
			dashboardPassword: from.dashboard_password,
		}),
		encode: (to) => ({
			port: to.port,
			dashboard_username: to.dashboardUsername,
			dashboard_password: to.dashboardPassword,
		}),
	},
);

export type ServerConfig = typeof ServerConfigSchema.Type;

export const StorageConfigSchema = Schema.transform(
	Schema.Struct({
		data_dir: Schema.optionalWith(Schema.String, { default: () => "data" }),
	}),
	Schema.Struct({
		dataDir: Schema.String,
	}),
	{
		strict: true,
		decode: (from) => ({ dataDir: from.data_dir }),
		encode: (to) => ({ data_dir: to.dataDir }),
	},
);

export type StorageConfig = typeof StorageConfigSchema.Type;

export const PromptsConfigSchema = Schema.Struct({
	directory: Schema.optionalWith(Schema.String, { default: () => "prompts" }),
});

export type PromptsConfig = typeof PromptsConfigSchema.Type;

/**
 * Initial values for the settings row. Only used when the database has none yet.
 */
export const DefaultsConfigSchema = Schema.transform(
	Schema.Struct({
		poll_interval_minutes: Schema.optionalWith(PollIntervalMinutes, { default: () => 5 }),
		messages_per_cycle: Schema.optionalWith(MessagesPerCycle, { default: () => 20 }),
		max_pending_per_chat: Schema.optionalWith(MaxPendingPerChat, { default: () => 1 }),
		cooldown_minutes: Schema.optionalWith(CooldownMinutes, { default: () => 0 }),
	}),
	Schema.Struct({
		pollIntervalMinutes: PollIntervalMinutes,
		messagesPerCycle: MessagesPerCycle,
		maxPendingPerChat: MaxPendingPerChat,
		cooldownMinutes: CooldownMinutes,
	}),
	{
		strict: true,
		decode: (from) => ({
			pollIntervalMinutes: from.poll_interval_minutes,
			messagesPerCycle: from.messages_per_cycle,
			maxPendingPerChat: from.max_pending_per_chat,
			cooldownMinutes: from.cooldown_minutes,
		}),
		encode: (to) => ({
			poll_interval_minutes: to.pollIntervalMinutes,
			messages_per_cycle: to.messagesPerCycle,
			max_pending_per_chat: to.maxPendingPerChat,
			cooldown_minutes: to.cooldownMinutes,
		}),
	},
);

export type DefaultsConfig = typeof DefaultsConfigSchema.Type;

export const LogLevelSchema = Schema.Literal("debug", "info", "warning", "error");

export const LoggingConfigSchema = Schema.Struct({
	level: Schema.optionalWith(LogLevelSchema, { default: () => "info" as const }),
});

export type LoggingConfig = typeof LoggingConfigSchema.Type;

/**
 * Schema for the complete configuration file.
 * Only [telegram] and [completion] are mandatory.
 */
export const AppConfigSchema = Schema.Struct({
	telegram: TelegramConfigSchema,
	completion: CompletionConfigSchema,
	server: Schema.optionalWith(ServerConfigSchema, { default: () => ({ port: 8000 }) }),
	storage: Schema.optionalWith(StorageConfigSchema, { default: () => ({ dataDir: "data" }) }),
	prompts: Schema.optionalWith(PromptsConfigSchema, { default: () => ({ directory: "prompts" }) }),
	defaults: Schema.optionalWith(DefaultsConfigSchema, {
		default: () => ({
			pollIntervalMinutes: 5,
			messagesPerCycle: 20,
			maxPendingPerChat: 1,
			cooldownMinutes: 0,
		}),
	}),
	logging: Schema.optionalWith(LoggingConfigSchema, { default: () => ({ level: "info" as const }) }),
});

/**
 * The decoded TypeScript type for the configuration.
 * All field names are camelCase.
 */
export type AppConfig = typeof AppConfigSchema.Type;

export interface DashboardCredentials {
	readonly username: string;
	readonly password: Redacted.Redacted<string>;
}

/**
 * Dashboard credentials, present only when both halves are configured.
 */
export const getDashboardCredentials = (config: AppConfig): DashboardCredentials | undefined =>
	config.server.dashboardUsername !== undefined && config.server.dashboardPassword !== undefined
		? { username: config.server.dashboardUsername, password: config.server.dashboardPassword }
		: undefined;
