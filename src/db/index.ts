/**
 * @fileoverview Database module.
 *
 * Exports the combined database layer and all repository services.
 * Use DatabaseLive to get a fully configured database with migrations run.
 *
 * @example
 * ```typescript
 * import { NodeContext } from "@effect/platform-node"
 * import { ChatRepository, DatabaseLive } from "./db/index.js"
 *
 * const program = Effect.gen(function* () {
 *   const chats = yield* ChatRepository
 *   return yield* chats.listSelected()
 * })
 *
 * program.pipe(
 *   Effect.provide(DatabaseLive),
 *   Effect.provide(Layer.succeed(Config, config)),
 *   Effect.provide(NodeContext.layer),
 * )
 * ```
 */

import type { SqlClient } from "@effect/sql";
import { Clock, Effect, Layer } from "effect";
import { Config } from "../config/index.js";
import { SqliteLive, SqliteTestLive } from "./client.js";
import { MigratorLive } from "./migrations.js";
import {
	ChatRepository,
	ChatRepositoryLive,
	type ChatRepositoryService,
} from "./repositories/chats.js";
import {
	SettingsRepository,
	SettingsRepositoryLive,
	type SettingsRepositoryService,
} from "./repositories/settings.js";
import {
	SuggestionRepository,
	SuggestionRepositoryLive,
	type SuggestionRepositoryService,
} from "./repositories/suggestions.js";

export {
	ChatRepository,
	type ChatRepositoryService,
	SettingsRepository,
	type SettingsRepositoryService,
	SuggestionRepository,
	type SuggestionRepositoryService,
};
export { PersistenceError } from "./errors.js";
export { SqliteLive, SqliteTestLive } from "./client.js";
export { MigratorLive } from "./migrations.js";

// =============================================================================
// Combined Layers
// =============================================================================

/**
 * Layer that provides all repositories. Requires SqlClient.
 */
export const RepositoriesLive: Layer.Layer<
	ChatRepository | SuggestionRepository | SettingsRepository,
	never,
	SqlClient.SqlClient
> = Layer.mergeAll(ChatRepositoryLive, SuggestionRepositoryLive, SettingsRepositoryLive);

/**
 * Full database layer: SQLite file under the data directory, migrations, repositories.
 *
 * Requires Config and the platform services (FileSystem, Path, CommandExecutor).
 */
export const DatabaseLive = RepositoriesLive.pipe(
	Layer.provideMerge(MigratorLive),
	Layer.provideMerge(SqliteLive),
);

/**
 * In-memory database with migrations applied. Each build is a fresh database.
 */
export const DatabaseTestLive = RepositoriesLive.pipe(
	Layer.provideMerge(MigratorLive),
	Layer.provideMerge(SqliteTestLive),
);

/**
 * Seeds the settings row from the [defaults] config section on first start.
 */
export const SettingsDefaultsLive = Layer.effectDiscard(
	Effect.gen(function* () {
		const config = yield* Config;
		const settingsRepo = yield* SettingsRepository;
		const now = new Date(yield* Clock.currentTimeMillis);
		const settings = yield* settingsRepo.initialize(config.defaults, now);
		yield* Effect.logInfo("Settings loaded", settings);
	}),
);
