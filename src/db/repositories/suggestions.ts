/**
 * @fileoverview Suggestion repository.
 *
 * Creating a suggestion also advances the owning chat's fingerprint in the
 * same transaction. Decisions are conditional single-row updates on
 * `status = 'pending'`.
 */

import { SqlClient } from "@effect/sql";
import { Context, Effect, Layer, Option, Schema } from "effect";
import type {
	DecidedStatus,
	NewSuggestion,
	Suggestion,
	SuggestionStatus,
} from "../../domain/suggestion.js";
import { SuggestionStatusSchema } from "../../domain/suggestion.js";
import { PersistenceError } from "../errors.js";

// =============================================================================
// Database Row Schemas
// =============================================================================

/**
 * A message of the source window, as stored in the source_messages JSON column.
 */
const StoredMessageSchema = Schema.Struct({
	id: Schema.String,
	text: Schema.String,
	outgoing: Schema.Boolean,
	sender: Schema.String,
	sentAt: Schema.Date,
});

const SourceMessagesJson = Schema.parseJson(Schema.Array(StoredMessageSchema));

const SuggestionRowSchema = Schema.Struct({
	id: Schema.Number,
	chat_id: Schema.String,
	suggested_text: Schema.String,
	translated_text: Schema.String,
	status: SuggestionStatusSchema,
	fingerprint: Schema.String,
	source_messages: SourceMessagesJson,
	reply_to_message_id: Schema.NullOr(Schema.String),
	created_at: Schema.String,
	decided_at: Schema.NullOr(Schema.String),
});

type SuggestionRow = Schema.Schema.Type<typeof SuggestionRowSchema>;

const rowToSuggestion = (row: SuggestionRow): Suggestion => ({
	id: row.id,
	chatId: row.chat_id,
	suggestedText: row.suggested_text,
	translatedText: row.translated_text,
	status: row.status,
	fingerprint: row.fingerprint,
	sourceMessages: row.source_messages,
	replyToMessageId: row.reply_to_message_id,
	createdAt: new Date(row.created_at),
	decidedAt: row.decided_at === null ? null : new Date(row.decided_at),
});

// =============================================================================
// Repository Interface
// =============================================================================

export interface SuggestionRepositoryService {
	/**
	 * Inserts a pending suggestion and sets the chat's last_fingerprint and
	 * last_successful_run_at, atomically. Fails (and writes nothing) if the
	 * chat does not exist.
	 */
	readonly create: (input: NewSuggestion) => Effect.Effect<Suggestion, PersistenceError>;

	readonly getById: (id: number) => Effect.Effect<Option.Option<Suggestion>, PersistenceError>;

	/**
	 * Lists suggestions, pending first and newest first within a status.
	 */
	readonly list: (
		status?: SuggestionStatus,
	) => Effect.Effect<readonly Suggestion[], PersistenceError>;

	/** Fresh count of undecided suggestions for a chat. */
	readonly countPending: (chatId: string) => Effect.Effect<number, PersistenceError>;

	/** Creation time of the chat's most recent suggestion, any status. */
	readonly latestCreatedAt: (
		chatId: string,
	) => Effect.Effect<Option.Option<Date>, PersistenceError>;

	/**
	 * Moves a pending suggestion to a terminal status.
	 * Returns None when no pending row with this id exists.
	 */
	readonly markDecided: (
		id: number,
		status: DecidedStatus,
		decidedAt: Date,
	) => Effect.Effect<Option.Option<Suggestion>, PersistenceError>;
}

export class SuggestionRepository extends Context.Tag("reply-drafter/SuggestionRepository")<
	SuggestionRepository,
	SuggestionRepositoryService
>() {}

// =============================================================================
// Repository Implementation
// =============================================================================

const make = Effect.gen(function* () {
	const sql = yield* SqlClient.SqlClient;
	const decodeRow = Schema.decodeUnknown(SuggestionRowSchema);
	const encodeMessages = Schema.encode(SourceMessagesJson);

	const create: SuggestionRepositoryService["create"] = (input) =>
		sql
			.withTransaction(
				Effect.gen(function* () {
					const createdAt = input.createdAt.toISOString();
					const sourceMessages = yield* encodeMessages(input.sourceMessages);

					const rows = yield* sql`
            INSERT INTO suggestions (
              chat_id, suggested_text, translated_text, status,
              fingerprint, source_messages, reply_to_message_id, created_at
            )
            VALUES (
              ${input.chatId}, ${input.suggestedText}, ${input.translatedText}, 'pending',
              ${input.fingerprint}, ${sourceMessages}, ${input.replyToMessageId}, ${createdAt}
            )
            RETURNING *
          `;

					const advanced = yield* sql`
            UPDATE chats SET
              last_fingerprint = ${input.fingerprint},
              last_successful_run_at = ${createdAt},
              updated_at = ${createdAt}
            WHERE id = ${input.chatId}
            RETURNING id
          `;
					if (advanced.length === 0) {
						return yield* Effect.fail(new Error(`Chat not found: ${input.chatId}`));
					}

					const row = yield* decodeRow(rows[0]);
					return rowToSuggestion(row);
				}),
			)
			.pipe(Effect.mapError((cause) => new PersistenceError({ method: "create", cause })));

	const getById: SuggestionRepositoryService["getById"] = (id) =>
		Effect.gen(function* () {
			const rows = yield* sql`SELECT * FROM suggestions WHERE id = ${id}`;
			if (rows.length === 0) {
				return Option.none();
			}
			const row = yield* decodeRow(rows[0]);
			return Option.some(rowToSuggestion(row));
		}).pipe(Effect.mapError((cause) => new PersistenceError({ method: "getById", cause })));

	const list: SuggestionRepositoryService["list"] = (status) =>
		Effect.gen(function* () {
			const rows =
				status !== undefined
					? yield* sql`
              SELECT * FROM suggestions
              WHERE status = ${status}
              ORDER BY created_at DESC, id DESC
            `
					: yield* sql`
              SELECT * FROM suggestions
              ORDER BY status = 'pending' DESC, created_at DESC, id DESC
            `;
			return yield* Effect.forEach(rows, (row) =>
				decodeRow(row).pipe(Effect.map(rowToSuggestion)),
			);
		}).pipe(Effect.mapError((cause) => new PersistenceError({ method: "list", cause })));

	const countPending: SuggestionRepositoryService["countPending"] = (chatId) =>
		Effect.gen(function* () {
			const rows = yield* sql<{ readonly pending: number }>`
        SELECT COUNT(*) AS pending FROM suggestions
        WHERE chat_id = ${chatId} AND status = 'pending'
      `;
			return rows[0]?.pending ?? 0;
		}).pipe(Effect.mapError((cause) => new PersistenceError({ method: "countPending", cause })));

	const latestCreatedAt: SuggestionRepositoryService["latestCreatedAt"] = (chatId) =>
		Effect.gen(function* () {
			const rows = yield* sql<{ readonly latest: string | null }>`
        SELECT MAX(created_at) AS latest FROM suggestions WHERE chat_id = ${chatId}
      `;
			const latest = rows[0]?.latest ?? null;
			return latest === null ? Option.none() : Option.some(new Date(latest));
		}).pipe(
			Effect.mapError((cause) => new PersistenceError({ method: "latestCreatedAt", cause })),
		);

	const markDecided: SuggestionRepositoryService["markDecided"] = (id, status, decidedAt) =>
		Effect.gen(function* () {
			const rows = yield* sql`
        UPDATE suggestions SET status = ${status}, decided_at = ${decidedAt.toISOString()}
        WHERE id = ${id} AND status = 'pending'
        RETURNING *
      `;
			if (rows.length === 0) {
				return Option.none();
			}
			const row = yield* decodeRow(rows[0]);
			return Option.some(rowToSuggestion(row));
		}).pipe(Effect.mapError((cause) => new PersistenceError({ method: "markDecided", cause })));

	return {
		create,
		getById,
		list,
		countPending,
		latestCreatedAt,
		markDecided,
	} satisfies SuggestionRepositoryService;
});

// =============================================================================
// Layer
// =============================================================================

export const SuggestionRepositoryLive: Layer.Layer<
	SuggestionRepository,
	never,
	SqlClient.SqlClient
> = Layer.effect(SuggestionRepository, make);
