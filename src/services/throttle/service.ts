/**
 * @fileoverview Pending-load throttle.
 *
 * Caps the number of undecided suggestions per chat and, optionally,
 * enforces a cooldown after the latest suggestion. Counts are read fresh on
 * every check.
 */

import { Context, Effect, Layer, Option } from "effect";
import type { PersistenceError } from "../../db/errors.js";
import { SuggestionRepository } from "../../db/index.js";
import type { Chat } from "../../domain/chat.js";
import { CoolingDownError, ThrottledError } from "../../domain/errors.js";
import type { Settings } from "../../domain/settings.js";

export interface ThrottleServiceImpl {
	readonly pendingCount: (chatId: string) => Effect.Effect<number, PersistenceError>;

	readonly underLimit: (
		chat: Pick<Chat, "id">,
		settings: Pick<Settings, "maxPendingPerChat">,
	) => Effect.Effect<boolean, PersistenceError>;

	/**
	 * Succeeds when a new suggestion may be drafted for the chat now.
	 */
	readonly check: (
		chat: Pick<Chat, "id">,
		settings: Pick<Settings, "maxPendingPerChat" | "cooldownMinutes">,
		now: Date,
	) => Effect.Effect<void, ThrottledError | CoolingDownError | PersistenceError>;
}

export class ThrottleService extends Context.Tag("reply-drafter/ThrottleService")<
	ThrottleService,
	ThrottleServiceImpl
>() {}

const make = Effect.gen(function* () {
	const suggestions = yield* SuggestionRepository;

	const pendingCount: ThrottleServiceImpl["pendingCount"] = (chatId) =>
		suggestions.countPending(chatId);

	const underLimit: ThrottleServiceImpl["underLimit"] = (chat, settings) =>
		pendingCount(chat.id).pipe(Effect.map((pending) => pending < settings.maxPendingPerChat));

	const check: ThrottleServiceImpl["check"] = (chat, settings, now) =>
		Effect.gen(function* () {
			const pending = yield* pendingCount(chat.id);
			if (pending >= settings.maxPendingPerChat) {
				return yield* Effect.fail(
					new ThrottledError({ chatId: chat.id, pending, limit: settings.maxPendingPerChat }),
				);
			}

			if (settings.cooldownMinutes > 0) {
				const latest = yield* suggestions.latestCreatedAt(chat.id);
				if (Option.isSome(latest)) {
					const until = new Date(latest.value.getTime() + settings.cooldownMinutes * 60_000);
					if (until.getTime() > now.getTime()) {
						return yield* Effect.fail(new CoolingDownError({ chatId: chat.id, until }));
					}
				}
			}
		});

	return { pendingCount, underLimit, check } satisfies ThrottleServiceImpl;
});

export const ThrottleServiceLive: Layer.Layer<ThrottleService, never, SuggestionRepository> =
	Layer.effect(ThrottleService, make);
