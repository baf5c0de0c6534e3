/**
 * @fileoverview Suggestion generator.
 *
 * Runs one drafting cycle for one chat:
 *
 * 1. fetch the last K messages
 * 2. skip if the window's fingerprint is unchanged, or if the newest message is our own
 * 3. skip if the chat is throttled or cooling down
 * 4. render the prompt
 * 5. ask the completion service for {reply, translation, reply_to_message_id?}
 * 6. store the pending suggestion and advance the chat's fingerprint together
 *
 * A reply target is kept only if it names an incoming message of the window.
 *
 * Skips and failures are typed errors; only step 6 writes anything, so a
 * failure at any earlier step leaves the chat's state untouched.
 */

import { Clock, Context, Effect, Layer } from "effect";
import type { PersistenceError } from "../../db/errors.js";
import { SuggestionRepository } from "../../db/index.js";
import type { Chat, ChatMessage } from "../../domain/chat.js";
import {
	AwaitingIncomingError,
	type CoolingDownError,
	type PromptError,
	type ServiceError,
	type ThrottledError,
	type TransportError,
	UnchangedError,
} from "../../domain/errors.js";
import { fingerprint, hasChanged } from "../../domain/fingerprint.js";
import type { Settings } from "../../domain/settings.js";
import type { Suggestion } from "../../domain/suggestion.js";
import { ChatClient } from "../chat/index.js";
import { CompletionClient } from "../completion/index.js";
import { PromptStore, buildReplyPrompt } from "../prompts/index.js";
import { ThrottleService } from "../throttle/index.js";

export type GenerateError =
	| TransportError
	| ServiceError
	| UnchangedError
	| AwaitingIncomingError
	| ThrottledError
	| CoolingDownError
	| PromptError
	| PersistenceError;

export interface SuggestionGeneratorImpl {
	/**
	 * Drafts at most one suggestion for the chat using the given settings snapshot.
	 */
	readonly generate: (chat: Chat, settings: Settings) => Effect.Effect<Suggestion, GenerateError>;
}

export class SuggestionGenerator extends Context.Tag("reply-drafter/SuggestionGenerator")<
	SuggestionGenerator,
	SuggestionGeneratorImpl
>() {}

const incomingTarget = (
	messages: readonly ChatMessage[],
	replyToMessageId: string | null,
): string | null =>
	messages.some((message) => !message.outgoing && message.id === replyToMessageId)
		? replyToMessageId
		: null;

const make = Effect.gen(function* () {
	const chatClient = yield* ChatClient;
	const completion = yield* CompletionClient;
	const prompts = yield* PromptStore;
	const throttle = yield* ThrottleService;
	const suggestions = yield* SuggestionRepository;

	const generate: SuggestionGeneratorImpl["generate"] = (chat, settings) =>
		Effect.gen(function* () {
			const messages = yield* chatClient.fetchRecent(chat.id, settings.messagesPerCycle);

			const current = fingerprint(messages);
			if (!hasChanged(chat, current)) {
				return yield* Effect.fail(new UnchangedError({ chatId: chat.id, fingerprint: current }));
			}

			const newest = messages[messages.length - 1];
			if (newest?.outgoing) {
				return yield* Effect.fail(new AwaitingIncomingError({ chatId: chat.id }));
			}

			const now = new Date(yield* Clock.currentTimeMillis);
			yield* throttle.check(chat, settings, now);

			const promptVersion = yield* prompts.currentVersion();
			const prompt = yield* buildReplyPrompt(prompts, chat, messages);
			const draft = yield* completion.complete(prompt);
			const replyToMessageId = incomingTarget(messages, draft.replyToMessageId);
			if (draft.replyToMessageId !== null && replyToMessageId === null) {
				yield* Effect.logDebug(
					`Dropping reply target ${draft.replyToMessageId}: not an incoming message`,
				);
			}

			const suggestion = yield* suggestions.create({
				chatId: chat.id,
				suggestedText: draft.replyText,
				translatedText: draft.translationText,
				fingerprint: current,
				sourceMessages: messages,
				replyToMessageId,
				createdAt: new Date(yield* Clock.currentTimeMillis),
			});

			yield* Effect.logInfo("Suggestion created", { suggestionId: suggestion.id, promptVersion });
			return suggestion;
		}).pipe(Effect.annotateLogs({ chatId: chat.id }), Effect.withLogSpan("generate"));

	return { generate } satisfies SuggestionGeneratorImpl;
});

export const SuggestionGeneratorLive: Layer.Layer<
	SuggestionGenerator,
	never,
	ChatClient | CompletionClient | PromptStore | ThrottleService | SuggestionRepository
> = Layer.effect(SuggestionGenerator, make);
