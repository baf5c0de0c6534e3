/**
 * @fileoverview SQLite database client layer.
 *
 * Creates the data directory if needed and opens the database file with
 * better-sqlite3 through @effect/sql-sqlite-node.
 */

import { FileSystem } from "@effect/platform";
import { SqliteClient } from "@effect/sql-sqlite-node";
import { Effect, Layer } from "effect";
import { Config } from "../config/index.js";
import { getDatabasePath } from "../lib/paths.js";

/**
 * Layer that opens <data_dir>/reply-drafter.db. WAL mode is enabled by the client.
 */
export const SqliteLive = Layer.unwrapEffect(
	Effect.gen(function* () {
		const config = yield* Config;
		const fs = yield* FileSystem.FileSystem;

		yield* fs.makeDirectory(config.storage.dataDir, { recursive: true });

		const dbPath = getDatabasePath(config.storage.dataDir);
		yield* Effect.log(`Initializing database at ${dbPath}`);

		return SqliteClient.layer({
			filename: dbPath,
		});
	}),
);

/**
 * In-memory database for tests.
 */
export const SqliteTestLive = SqliteClient.layer({
	filename: ":memory:",
});
