/**
 * @fileoverview Reply prompt construction.
 *
 * @module
 */

import { Effect } from "effect";
import type { Chat, ChatMessage } from "../../domain/chat.js";
import type { PromptError } from "../../domain/errors.js";
import type { CompletionPrompt } from "../completion/index.js";
import { formatTranscript } from "./formatters.js";
import type { PromptStoreService } from "./store.js";

/**
 * Variables available to every prompt template.
 */
export const replyPromptVariables = (
	chat: Pick<Chat, "title" | "languageHint">,
	messages: readonly ChatMessage[],
): Readonly<Record<string, string>> => ({
	chat_title: chat.title,
	language_hint: chat.languageHint ?? "the language of the conversation",
	message_count: String(messages.length),
	transcript: formatTranscript(messages),
});

/**
 * Renders the system and suggest_reply templates for one chat window.
 */
export const buildReplyPrompt = (
	store: PromptStoreService,
	chat: Pick<Chat, "title" | "languageHint">,
	messages: readonly ChatMessage[],
): Effect.Effect<CompletionPrompt, PromptError> => {
	const variables = replyPromptVariables(chat, messages);
	return Effect.all({
		system: store.render("system", variables),
		user: store.render("suggest_reply", variables),
	});
};
