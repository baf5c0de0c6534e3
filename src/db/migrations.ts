/**
 * @fileoverview Database migrations layer.
 *
 * Migrations are bundled in an in-memory list and applied in order on startup.
 */

import type { Migrator } from "@effect/sql";
import { SqliteMigrator } from "@effect/sql-sqlite-node";
import { Effect } from "effect";

import migration0001 from "./migrations/0001_initial_schema.js";
import migration0002 from "./migrations/0002_reply_target.js";

/**
 * Each migration is a tuple of [id, name, load].
 */
const migrations: Migrator.ResolvedMigration[] = [
	[1, "initial_schema", Effect.succeed(migration0001)],
	[2, "reply_target", Effect.succeed(migration0002)],
];

const loader: Migrator.Loader = Effect.succeed(migrations);

/**
 * Runs pending migrations when built. Tracks applied ids in effect_sql_migrations.
 */
export const MigratorLive = SqliteMigrator.layer({ loader });
