/**
 * @fileoverview Initial database schema.
 *
 * Creates the following tables:
 * - chats: conversations known from the platform and their pipeline state
 * - suggestions: drafted replies and their review status
 * - settings: the single row of operator-editable pipeline settings
 */

import { SqlClient } from "@effect/sql";
import { Effect } from "effect";

export default Effect.gen(function* () {
	const sql = yield* SqlClient.SqlClient;

	yield* sql`
    CREATE TABLE IF NOT EXISTS chats (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      language_hint TEXT,
      is_selected INTEGER NOT NULL DEFAULT 0,
      last_fingerprint TEXT,
      last_successful_run_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `;

	yield* sql`
    CREATE TABLE IF NOT EXISTS suggestions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      chat_id TEXT NOT NULL REFERENCES chats(id),
      suggested_text TEXT NOT NULL,
      translated_text TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending'
        CHECK (status IN ('pending', 'sent', 'declined')),
      fingerprint TEXT NOT NULL,
      source_messages JSON NOT NULL,
      created_at TEXT NOT NULL,
      decided_at TEXT
    )
  `;

	yield* sql`
    CREATE INDEX IF NOT EXISTS idx_suggestions_chat_status
    ON suggestions(chat_id, status)
  `;

	// Decided suggestions are immutable
	yield* sql`
    CREATE TRIGGER IF NOT EXISTS suggestions_status_terminal
    BEFORE UPDATE OF status ON suggestions
    WHEN OLD.status <> 'pending'
    BEGIN
      SELECT RAISE(ABORT, 'suggestion status is terminal');
    END
  `;

	yield* sql`
    CREATE TABLE IF NOT EXISTS settings (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      poll_interval_minutes INTEGER NOT NULL,
      messages_per_cycle INTEGER NOT NULL,
      max_pending_per_chat INTEGER NOT NULL,
      cooldown_minutes INTEGER NOT NULL DEFAULT 0,
      updated_at TEXT NOT NULL
    )
  `;
});
