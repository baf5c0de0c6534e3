/**
 * @fileoverview Periodic scheduler.
 *
 * Drives the suggestion generator over every selected chat. One tick runs at
 * startup, then ticks start `pollIntervalMinutes` apart (start to start, so a
 * long tick delays the next one rather than overlapping it). The interval is
 * taken from the settings snapshot read at the start of each tick.
 *
 * Ticks are serialized by a single permit shared with `runNow`. Every chat is
 * processed in isolation: its failures and defects are logged and counted,
 * never propagated to the tick.
 *
 * On shutdown the tick in progress finishes the chat it is on and stops
 * before the next one.
 */

import { Cause, Clock, Context, Duration, Effect, Layer, Option, Queue, Ref } from "effect";
import { Config } from "../../config/index.js";
import type { PersistenceError } from "../../db/errors.js";
import { ChatRepository, SettingsRepository } from "../../db/index.js";
import type { Chat } from "../../domain/chat.js";
import { isSkip } from "../../domain/errors.js";
import type { Settings } from "../../domain/settings.js";
import { SuggestionGenerator } from "../generator/index.js";

// =============================================================================
// Types
// =============================================================================

export type SchedulerState = "idle" | "running" | "stopped";

export type TickTrigger = "schedule" | "manual";

export interface ChatOutcome {
	readonly chatId: string;
	readonly result: "created" | "skipped" | "failed";
	/** Suggestion id when created, error tag otherwise */
	readonly detail: string;
}

export interface TickReport {
	readonly trigger: TickTrigger;
	readonly startedAt: Date;
	readonly finishedAt: Date;
	readonly pollIntervalMinutes: number;
	readonly outcomes: readonly ChatOutcome[];
	readonly created: number;
	readonly skipped: number;
	readonly failed: number;
	/** True when shutdown stopped the tick before every selected chat was processed */
	readonly interrupted: boolean;
}

export interface SchedulerStatus {
	readonly state: SchedulerState;
	readonly lastReport: Option.Option<TickReport>;
	readonly nextTickAt: Option.Option<Date>;
}

export interface SchedulerServiceImpl {
	/** Runs one tick now, after any tick in progress. */
	readonly runNow: () => Effect.Effect<TickReport, PersistenceError>;

	/** Re-reads the interval and reschedules the next tick. */
	readonly wake: () => Effect.Effect<void>;

	readonly status: () => Effect.Effect<SchedulerStatus>;
}

export class Scheduler extends Context.Tag("reply-drafter/Scheduler")<
	Scheduler,
	SchedulerServiceImpl
>() {}

// =============================================================================
// Implementation
// =============================================================================

const countOf = (outcomes: readonly ChatOutcome[], result: ChatOutcome["result"]): number =>
	outcomes.filter((outcome) => outcome.result === result).length;

const make = Effect.gen(function* () {
	const config = yield* Config;
	const generator = yield* SuggestionGenerator;
	const chats = yield* ChatRepository;
	const settingsRepo = yield* SettingsRepository;

	const permit = yield* Effect.makeSemaphore(1);
	const stopping = yield* Ref.make(false);
	const state = yield* Ref.make<SchedulerState>("idle");
	const lastReport = yield* Ref.make(Option.none<TickReport>());
	const nextTickAt = yield* Ref.make(Option.none<Date>());
	const wakeups = yield* Queue.sliding<void>(1);

	const currentDate = Effect.map(Clock.currentTimeMillis, (millis) => new Date(millis));

	const processChat = (chat: Chat, settings: Settings): Effect.Effect<ChatOutcome> =>
		generator.generate(chat, settings).pipe(
			Effect.map(
				(suggestion): ChatOutcome => ({
					chatId: chat.id,
					result: "created",
					detail: String(suggestion.id),
				}),
			),
			Effect.catchAll((error) =>
				isSkip(error)
					? Effect.logDebug(`Skipped: ${error.message}`).pipe(
							Effect.as<ChatOutcome>({ chatId: chat.id, result: "skipped", detail: error._tag }),
						)
					: Effect.logWarning(`Drafting failed: ${error.message}`).pipe(
							Effect.as<ChatOutcome>({ chatId: chat.id, result: "failed", detail: error._tag }),
						),
			),
			Effect.catchAllDefect((defect) =>
				Effect.logError("Unexpected failure while drafting", Cause.die(defect)).pipe(
					Effect.as<ChatOutcome>({ chatId: chat.id, result: "failed", detail: "Defect" }),
				),
			),
			Effect.annotateLogs({ chatId: chat.id }),
		);

	const tick = (trigger: TickTrigger): Effect.Effect<TickReport, PersistenceError> =>
		permit.withPermits(1)(
			Effect.gen(function* () {
				const startedAt = yield* currentDate;
				const settings = yield* settingsRepo.get();
				const selected = yield* chats.listSelected();

				yield* Ref.set(state, "running");
				yield* Effect.logInfo(`Tick started for ${selected.length} chat(s)`);

				const outcomes: ChatOutcome[] = [];
				let interrupted = false;
				for (const chat of selected) {
					if (yield* Ref.get(stopping)) {
						interrupted = true;
						break;
					}
					outcomes.push(yield* processChat(chat, settings));
				}

				const report: TickReport = {
					trigger,
					startedAt,
					finishedAt: yield* currentDate,
					pollIntervalMinutes: settings.pollIntervalMinutes,
					outcomes,
					created: countOf(outcomes, "created"),
					skipped: countOf(outcomes, "skipped"),
					failed: countOf(outcomes, "failed"),
					interrupted,
				};
				yield* Ref.set(lastReport, Option.some(report));
				yield* Effect.logInfo(
					`Tick finished: ${report.created} created, ${report.skipped} skipped, ${report.failed} failed`,
				);
				return report;
			}).pipe(
				Effect.ensuring(Ref.update(state, (current) => (current === "running" ? "idle" : current))),
				Effect.annotateLogs({ trigger }),
				Effect.withLogSpan("tick"),
			),
		);

	/**
	 * Sleeps until `lastStart + interval`. A wake-up re-reads the interval and
	 * recomputes the deadline; a deadline already past returns at once.
	 */
	const waitForNextTick = (lastStart: number, intervalMinutes: number): Effect.Effect<void> =>
		Effect.gen(function* () {
			let interval = intervalMinutes;
			while (true) {
				const dueAt = lastStart + interval * 60_000;
				yield* Ref.set(nextTickAt, Option.some(new Date(dueAt)));

				const remaining = dueAt - (yield* Clock.currentTimeMillis);
				if (remaining <= 0) {
					return;
				}

				const woken = yield* Effect.race(
					Effect.sleep(Duration.millis(remaining)).pipe(Effect.as(false)),
					Queue.take(wakeups).pipe(Effect.as(true)),
				);
				if (!woken) {
					return;
				}

				interval = yield* settingsRepo.get().pipe(
					Effect.map((settings) => settings.pollIntervalMinutes),
					Effect.catchAll((error) =>
						Effect.logWarning(`Keeping interval of ${interval} minute(s): ${error.message}`).pipe(
							Effect.as(interval),
						),
					),
				);
			}
		});

	const loop = Effect.gen(function* () {
		let interval = config.defaults.pollIntervalMinutes;
		while (!(yield* Ref.get(stopping))) {
			const startedAt = yield* Clock.currentTimeMillis;
			const report = yield* tick("schedule").pipe(
				Effect.map(Option.some),
				Effect.catchAll((error) =>
					Effect.logError(`Tick failed: ${error.message}`).pipe(Effect.as(Option.none<TickReport>())),
				),
			);
			if (Option.isSome(report)) {
				interval = report.value.pollIntervalMinutes;
			}
			if (yield* Ref.get(stopping)) {
				break;
			}
			yield* waitForNextTick(startedAt, interval);
		}
	});

	yield* Effect.forkScoped(loop);

	// Runs before the loop fiber is interrupted (finalizers run in reverse order)
	yield* Effect.addFinalizer(() =>
		Effect.gen(function* () {
			yield* Ref.set(stopping, true);
			yield* Effect.logInfo("Scheduler stopping");
			yield* permit.withPermits(1)(Effect.void);
			yield* Ref.set(state, "stopped");
			yield* Ref.set(nextTickAt, Option.none());
		}),
	);

	const runNow: SchedulerServiceImpl["runNow"] = () => tick("manual");

	const wake: SchedulerServiceImpl["wake"] = () => Queue.offer(wakeups, undefined).pipe(Effect.asVoid);

	const status: SchedulerServiceImpl["status"] = () =>
		Effect.all({
			state: Ref.get(state),
			lastReport: Ref.get(lastReport),
			nextTickAt: Ref.get(nextTickAt),
		});

	return { runNow, wake, status } satisfies SchedulerServiceImpl;
});

/**
 * Starts the scheduling loop when built; stops it when the layer's scope closes.
 */
export const SchedulerLive: Layer.Layer<
	Scheduler,
	never,
	Config | SuggestionGenerator | ChatRepository | SettingsRepository
> = Layer.scoped(Scheduler, make);
