/**
 * @fileoverview Chat repository.
 *
 * Stores the conversations known from the chat platform, which of them the
 * operator monitors, and the fingerprint of the last processed window.
 */

import { SqlClient } from "@effect/sql";
import { Context, Effect, Layer, Option, Schema } from "effect";
import type { Chat, Dialog } from "../../domain/chat.js";
import { PersistenceError } from "../errors.js";

// =============================================================================
// Database Row Schema
// =============================================================================

export const ChatRowSchema = Schema.Struct({
	id: Schema.String,
	title: Schema.String,
	language_hint: Schema.NullOr(Schema.String),
	is_selected: Schema.Number,
	last_fingerprint: Schema.NullOr(Schema.String),
	last_successful_run_at: Schema.NullOr(Schema.String),
	created_at: Schema.String,
	updated_at: Schema.String,
});

type ChatRow = Schema.Schema.Type<typeof ChatRowSchema>;

export const rowToChat = (row: ChatRow): Chat => ({
	id: row.id,
	title: row.title,
	languageHint: row.language_hint,
	isSelected: row.is_selected === 1,
	lastFingerprint: row.last_fingerprint,
	lastSuccessfulRunAt:
		row.last_successful_run_at === null ? null : new Date(row.last_successful_run_at),
	createdAt: new Date(row.created_at),
	updatedAt: new Date(row.updated_at),
});

// =============================================================================
// Repository Interface
// =============================================================================

export interface ChatRepositoryService {
	/**
	 * Inserts unknown dialogs and refreshes the title of known ones.
	 * Selection and pipeline state of existing chats are left alone.
	 */
	readonly upsertDialogs: (
		dialogs: readonly Dialog[],
		now: Date,
	) => Effect.Effect<void, PersistenceError>;

	/** All chats, selected first, then by title. */
	readonly listAll: () => Effect.Effect<readonly Chat[], PersistenceError>;

	readonly listSelected: () => Effect.Effect<readonly Chat[], PersistenceError>;

	readonly getById: (id: string) => Effect.Effect<Option.Option<Chat>, PersistenceError>;

	/**
	 * Makes exactly the given chats selected. Unknown ids are ignored.
	 * Returns the number of chats now selected.
	 */
	readonly setSelection: (
		ids: readonly string[],
		now: Date,
	) => Effect.Effect<number, PersistenceError>;

	readonly setLanguageHint: (
		id: string,
		languageHint: string | null,
		now: Date,
	) => Effect.Effect<Option.Option<Chat>, PersistenceError>;
}

export class ChatRepository extends Context.Tag("reply-drafter/ChatRepository")<
	ChatRepository,
	ChatRepositoryService
>() {}

// =============================================================================
// Repository Implementation
// =============================================================================

const make = Effect.gen(function* () {
	const sql = yield* SqlClient.SqlClient;
	const decodeRow = Schema.decodeUnknown(ChatRowSchema);

	const decodeRows = (rows: ReadonlyArray<unknown>) =>
		Effect.forEach(rows, (row) => decodeRow(row).pipe(Effect.map(rowToChat)));

	const upsertDialogs: ChatRepositoryService["upsertDialogs"] = (dialogs, now) =>
		sql
			.withTransaction(
				Effect.forEach(
					dialogs,
					(dialog) => sql`
            INSERT INTO chats (id, title, created_at, updated_at)
            VALUES (${dialog.id}, ${dialog.title}, ${now.toISOString()}, ${now.toISOString()})
            ON CONFLICT(id) DO UPDATE SET
              title = excluded.title,
              updated_at = excluded.updated_at
          `,
					{ discard: true },
				),
			)
			.pipe(Effect.mapError((cause) => new PersistenceError({ method: "upsertDialogs", cause })));

	const listAll: ChatRepositoryService["listAll"] = () =>
		Effect.gen(function* () {
			const rows = yield* sql`
        SELECT * FROM chats
        ORDER BY is_selected DESC, title COLLATE NOCASE ASC
      `;
			return yield* decodeRows(rows);
		}).pipe(Effect.mapError((cause) => new PersistenceError({ method: "listAll", cause })));

	const listSelected: ChatRepositoryService["listSelected"] = () =>
		Effect.gen(function* () {
			const rows = yield* sql`
        SELECT * FROM chats
        WHERE is_selected = 1
        ORDER BY title COLLATE NOCASE ASC
      `;
			return yield* decodeRows(rows);
		}).pipe(Effect.mapError((cause) => new PersistenceError({ method: "listSelected", cause })));

	const getById: ChatRepositoryService["getById"] = (id) =>
		Effect.gen(function* () {
			const rows = yield* sql`SELECT * FROM chats WHERE id = ${id}`;
			if (rows.length === 0) {
				return Option.none();
			}
			const row = yield* decodeRow(rows[0]);
			return Option.some(rowToChat(row));
		}).pipe(Effect.mapError((cause) => new PersistenceError({ method: "getById", cause })));

	const setSelection: ChatRepositoryService["setSelection"] = (ids, now) =>
		sql
			.withTransaction(
				Effect.gen(function* () {
					yield* sql`
            UPDATE chats SET is_selected = 0, updated_at = ${now.toISOString()}
            WHERE is_selected = 1
          `;
					for (const id of ids) {
						yield* sql`
              UPDATE chats SET is_selected = 1, updated_at = ${now.toISOString()}
              WHERE id = ${id}
            `;
					}
					const rows = yield* sql<{ readonly selected: number }>`
            SELECT COUNT(*) AS selected FROM chats WHERE is_selected = 1
          `;
					return rows[0]?.selected ?? 0;
				}),
			)
			.pipe(Effect.mapError((cause) => new PersistenceError({ method: "setSelection", cause })));

	const setLanguageHint: ChatRepositoryService["setLanguageHint"] = (id, languageHint, now) =>
		Effect.gen(function* () {
			const rows = yield* sql`
        UPDATE chats SET language_hint = ${languageHint}, updated_at = ${now.toISOString()}
        WHERE id = ${id}
        RETURNING *
      `;
			if (rows.length === 0) {
				return Option.none();
			}
			const row = yield* decodeRow(rows[0]);
			return Option.some(rowToChat(row));
		}).pipe(Effect.mapError((cause) => new PersistenceError({ method: "setLanguageHint", cause })));

	return {
		upsertDialogs,
		listAll,
		listSelected,
		getById,
		setSelection,
		setLanguageHint,
	} satisfies ChatRepositoryService;
});

// =============================================================================
// Layer
// =============================================================================

export const ChatRepositoryLive: Layer.Layer<ChatRepository, never, SqlClient.SqlClient> =
	Layer.effect(ChatRepository, make);
