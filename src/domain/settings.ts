/**
 * Operator-editable pipeline settings.
 *
 * @module
 */

import { Schema } from "effect";

export const PollIntervalMinutes = Schema.Int.pipe(Schema.between(1, 1440));
export const MessagesPerCycle = Schema.Int.pipe(Schema.between(1, 100));
export const MaxPendingPerChat = Schema.Int.pipe(Schema.between(1, 10));
export const CooldownMinutes = Schema.Int.pipe(Schema.between(0, 1440));

/**
 * Settings as exchanged over the API and stored in the settings row.
 */
export const SettingsSchema = Schema.Struct({
	/** Minutes between the starts of two consecutive ticks */
	pollIntervalMinutes: PollIntervalMinutes,
	/** K: how many recent messages are fetched per chat */
	messagesPerCycle: MessagesPerCycle,
	maxPendingPerChat: MaxPendingPerChat,
	/** Minimum age of the latest suggestion before another is drafted; 0 disables */
	cooldownMinutes: CooldownMinutes,
});

export type Settings = typeof SettingsSchema.Type;
