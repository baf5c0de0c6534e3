/**
 * @fileoverview Decision handler: applies Send, SendReply or Decline to a
 * pending suggestion.
 *
 * Send posts the suggested text (never the translation) to the chat and only
 * then marks the suggestion sent. SendReply does the same as a reply to the
 * chosen source message, or as a plain message when there is none. If posting
 * fails the suggestion stays pending and the error is returned.
 *
 * A suggestion is claimed for the whole decision, so a concurrent decision on
 * the same id fails with InvalidStateError instead of posting twice. Once the
 * post starts, it and the status write run uninterruptibly.
 */

import { Clock, Context, Effect, HashSet, Layer, Option, Ref } from "effect";
import type { PersistenceError } from "../../db/errors.js";
import { SuggestionRepository } from "../../db/index.js";
import {
	InvalidStateError,
	NotFoundError,
	type TransportError,
} from "../../domain/errors.js";
import {
	type Decision,
	type Suggestion,
	decisionAction,
	replyTarget,
	transition,
} from "../../domain/suggestion.js";
import { ChatClient } from "../chat/index.js";

export type DecisionError = NotFoundError | InvalidStateError | TransportError | PersistenceError;

export interface DecisionServiceImpl {
	readonly applyDecision: (
		suggestionId: number,
		decision: Decision,
	) => Effect.Effect<Suggestion, DecisionError>;
}

export class DecisionService extends Context.Tag("reply-drafter/DecisionService")<
	DecisionService,
	DecisionServiceImpl
>() {}

// Status reported for a suggestion another decision holds
const IN_PROGRESS = "in progress";

const make = Effect.gen(function* () {
	const suggestions = yield* SuggestionRepository;
	const chatClient = yield* ChatClient;
	const claimed = yield* Ref.make(HashSet.empty<number>());

	const claim = (suggestionId: number): Effect.Effect<boolean> =>
		Ref.modify(claimed, (ids) =>
			HashSet.has(ids, suggestionId) ? [false, ids] : [true, HashSet.add(ids, suggestionId)],
		);

	const release = (suggestionId: number): Effect.Effect<void> =>
		Ref.update(claimed, HashSet.remove(suggestionId));

	const post = (suggestion: Suggestion, decision: Decision): Effect.Effect<void, TransportError> => {
		if (decision._tag === "Decline") {
			return Effect.void;
		}
		if (decision._tag === "Send") {
			return chatClient.postMessage(suggestion.chatId, suggestion.suggestedText);
		}
		const target = replyTarget(suggestion);
		if (target === null) {
			return Effect.logInfo("No incoming message to reply to; sending as a plain message").pipe(
				Effect.zipRight(chatClient.postMessage(suggestion.chatId, suggestion.suggestedText)),
			);
		}
		return chatClient
			.postMessage(suggestion.chatId, suggestion.suggestedText, target)
			.pipe(Effect.annotateLogs({ replyTo: target }));
	};

	const decide = (suggestionId: number, decision: Decision) =>
		Effect.gen(function* () {
			const found = yield* suggestions.getById(suggestionId);
			if (Option.isNone(found)) {
				return yield* Effect.fail(
					new NotFoundError({ entity: "suggestion", id: String(suggestionId) }),
				);
			}
			const suggestion = found.value;

			const next = yield* transition(suggestion, decision);

			const updated = yield* Effect.uninterruptible(
				Effect.gen(function* () {
					yield* post(suggestion, decision);
					const decidedAt = new Date(yield* Clock.currentTimeMillis);
					return yield* suggestions.markDecided(suggestionId, next, decidedAt);
				}),
			);
			if (Option.isNone(updated)) {
				// Decided outside this process since it was read
				const latest = yield* suggestions.getById(suggestionId);
				return yield* Effect.fail(
					new InvalidStateError({
						suggestionId,
						status: Option.match(latest, {
							onNone: () => "missing",
							onSome: (row) => row.status,
						}),
						attemptedAction: decisionAction(decision),
					}),
				);
			}

			yield* Effect.logInfo(`Suggestion ${next}`, { chatId: suggestion.chatId });
			return updated.value;
		});

	const applyDecision: DecisionServiceImpl["applyDecision"] = (suggestionId, decision) =>
		Effect.acquireUseRelease(
			claim(suggestionId),
			(acquired): Effect.Effect<Suggestion, DecisionError> =>
				acquired
					? decide(suggestionId, decision)
					: Effect.fail(
							new InvalidStateError({
								suggestionId,
								status: IN_PROGRESS,
								attemptedAction: decisionAction(decision),
							}),
						),
			(acquired) => (acquired ? release(suggestionId) : Effect.void),
		).pipe(
			Effect.tapError((error) => Effect.logWarning(`Decision failed: ${error.message}`)),
			Effect.annotateLogs({ suggestionId, decision: decisionAction(decision) }),
		);

	return { applyDecision } satisfies DecisionServiceImpl;
});

export const DecisionServiceLive: Layer.Layer<
	DecisionService,
	never,
	SuggestionRepository | ChatClient
> = Layer.effect(DecisionService, make);
