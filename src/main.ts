/**
 * @fileoverview Reply drafter entry point.
 *
 * Loads configuration, opens the database, starts the scheduler and serves
 * the dashboard API until interrupted.
 */

import { createServer } from "node:http";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeHttpServer, NodeRuntime } from "@effect/platform-node";
import { Effect, Layer } from "effect";
import { ApiLive } from "./api/routes.js";
import {
	type AppConfig,
	Config,
	configPathFromArgs,
	describeConfigError,
	loadConfig,
} from "./config/index.js";
import { DatabaseLive, SettingsDefaultsLive } from "./db/index.js";
import { LoggerLive } from "./lib/logger.js";
import { TelegramChatClientLive } from "./services/chat/index.js";
import { CompletionClientLive } from "./services/completion/index.js";
import { DecisionServiceLive } from "./services/decisions/index.js";
import { SuggestionGeneratorLive } from "./services/generator/index.js";
import { PromptStoreLive } from "./services/prompts/index.js";
import { SchedulerLive } from "./services/scheduler/index.js";
import { ThrottleServiceLive } from "./services/throttle/index.js";

// =============================================================================
// Layer Setup
// =============================================================================

/**
 * Creates the full application layer from the loaded configuration.
 */
const createAppLayer = (config: AppConfig) => {
	const ConfigLayer = Layer.succeed(Config, config);

	// Database, migrated and seeded with the [defaults] settings on first start
	const DbLayer = SettingsDefaultsLive.pipe(
		Layer.provideMerge(DatabaseLive),
		Layer.provide(ConfigLayer),
	);

	// External collaborators
	const ChatLayer = TelegramChatClientLive.pipe(Layer.provide(ConfigLayer));
	const CompletionLayer = CompletionClientLive.pipe(
		Layer.provide(ConfigLayer),
		Layer.provide(FetchHttpClient.layer),
	);
	const PromptLayer = PromptStoreLive.pipe(Layer.provide(ConfigLayer));

	const InfraLayer = Layer.mergeAll(ConfigLayer, DbLayer, ChatLayer, CompletionLayer, PromptLayer);

	// Pipeline
	const GeneratorLayer = SuggestionGeneratorLive.pipe(
		Layer.provide(ThrottleServiceLive),
		Layer.provideMerge(InfraLayer),
	);
	const PipelineLayer = Layer.mergeAll(SchedulerLive, DecisionServiceLive).pipe(
		Layer.provideMerge(GeneratorLayer),
	);

	// HTTP server
	const ServerLayer = NodeHttpServer.layer(createServer, { port: config.server.port });

	return ApiLive.pipe(Layer.provide(ServerLayer), Layer.provide(PipelineLayer));
};

// =============================================================================
// Main Program
// =============================================================================

const program = Effect.gen(function* () {
	const config = yield* loadConfig(configPathFromArgs(process.argv.slice(2))).pipe(
		Effect.catchAll((error) =>
			Effect.sync((): never => {
				for (const line of describeConfigError(error)) {
					console.error(line);
				}
				process.exit(1);
			}),
		),
	);

	return yield* Effect.logInfo(`Reply drafter starting on port ${config.server.port}`).pipe(
		Effect.zipRight(Layer.launch(createAppLayer(config))),
		Effect.provide(LoggerLive(config.storage.dataDir, config.logging)),
	);
});

// =============================================================================
// Entry Point
// =============================================================================

NodeRuntime.runMain(program.pipe(Effect.provide(NodeContext.layer)));
