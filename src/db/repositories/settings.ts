/**
 * @fileoverview Settings repository (single row, id = 1).
 */

import { SqlClient } from "@effect/sql";
import { Context, Effect, Layer, Schema } from "effect";
import type { Settings } from "../../domain/settings.js";
import {
	CooldownMinutes,
	MaxPendingPerChat,
	MessagesPerCycle,
	PollIntervalMinutes,
} from "../../domain/settings.js";
import { PersistenceError } from "../errors.js";

const SettingsRowSchema = Schema.Struct({
	poll_interval_minutes: PollIntervalMinutes,
	messages_per_cycle: MessagesPerCycle,
	max_pending_per_chat: MaxPendingPerChat,
	cooldown_minutes: CooldownMinutes,
});

type SettingsRow = Schema.Schema.Type<typeof SettingsRowSchema>;

const rowToSettings = (row: SettingsRow): Settings => ({
	pollIntervalMinutes: row.poll_interval_minutes,
	messagesPerCycle: row.messages_per_cycle,
	maxPendingPerChat: row.max_pending_per_chat,
	cooldownMinutes: row.cooldown_minutes,
});

export interface SettingsRepositoryService {
	/**
	 * Writes `defaults` unless a settings row already exists, then returns the stored row.
	 */
	readonly initialize: (defaults: Settings, now: Date) => Effect.Effect<Settings, PersistenceError>;

	/** Reads the current settings. Fails if the row was never initialized. */
	readonly get: () => Effect.Effect<Settings, PersistenceError>;

	readonly save: (settings: Settings, now: Date) => Effect.Effect<Settings, PersistenceError>;
}

export class SettingsRepository extends Context.Tag("reply-drafter/SettingsRepository")<
	SettingsRepository,
	SettingsRepositoryService
>() {}

const make = Effect.gen(function* () {
	const sql = yield* SqlClient.SqlClient;
	const decodeRow = Schema.decodeUnknown(SettingsRowSchema);

	const read = Effect.gen(function* () {
		const rows = yield* sql`SELECT * FROM settings WHERE id = 1`;
		if (rows.length === 0) {
			return yield* Effect.fail(new Error("Settings have not been initialized"));
		}
		const row = yield* decodeRow(rows[0]);
		return rowToSettings(row);
	});

	const insert = (settings: Settings, now: Date) => sql`
    INSERT INTO settings (
      id, poll_interval_minutes, messages_per_cycle,
      max_pending_per_chat, cooldown_minutes, updated_at
    )
    VALUES (
      1, ${settings.pollIntervalMinutes}, ${settings.messagesPerCycle},
      ${settings.maxPendingPerChat}, ${settings.cooldownMinutes}, ${now.toISOString()}
    )
    ON CONFLICT(id) DO NOTHING
  `;

	const update = (settings: Settings, now: Date) => sql`
    UPDATE settings SET
      poll_interval_minutes = ${settings.pollIntervalMinutes},
      messages_per_cycle = ${settings.messagesPerCycle},
      max_pending_per_chat = ${settings.maxPendingPerChat},
      cooldown_minutes = ${settings.cooldownMinutes},
      updated_at = ${now.toISOString()}
    WHERE id = 1
  `;

	const initialize: SettingsRepositoryService["initialize"] = (defaults, now) =>
		insert(defaults, now).pipe(
			Effect.zipRight(read),
			Effect.mapError((cause) => new PersistenceError({ method: "initialize", cause })),
		);

	const get: SettingsRepositoryService["get"] = () =>
		read.pipe(Effect.mapError((cause) => new PersistenceError({ method: "get", cause })));

	const save: SettingsRepositoryService["save"] = (settings, now) =>
		insert(settings, now).pipe(
			Effect.zipRight(update(settings, now)),
			Effect.zipRight(read),
			Effect.mapError((cause) => new PersistenceError({ method: "save", cause })),
		);

	return { initialize, get, save } satisfies SettingsRepositoryService;
});

export const SettingsRepositoryLive: Layer.Layer<
	SettingsRepository,
	never,
	SqlClient.SqlClient
> = Layer.effect(SettingsRepository, make);
