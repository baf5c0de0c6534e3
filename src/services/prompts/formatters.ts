/**
 * @fileoverview Formatting utilities for prompt construction.
 *
 * Pure functions that turn fetched chat messages into the transcript
 * embedded in the reply prompt.
 *
 * @module
 */

import type { ChatMessage } from "../../domain/chat.js";

/**
 * Minute-precision UTC timestamp, e.g. `2024-05-01 09:30`.
 */
export const formatTimestamp = (date: Date): string =>
	date.toISOString().slice(0, 16).replace("T", " ");

/**
 * Who wrote a message, from the operator's point of view.
 */
export const formatSpeaker = (message: ChatMessage): string => {
	if (message.outgoing) {
		return "Me";
	}
	return message.sender === "unknown" ? "Them" : `Them (${message.sender})`;
};

/**
 * Format a single message line, with the message id the model may reply to.
 *
 * Example output:
 * ```
 * [2024-05-01 09:30] #812 Them (1001): Are we still on for tomorrow?
 * ```
 * Continuation lines of multi-line messages are indented by four spaces.
 */
export const formatMessage = (message: ChatMessage): string =>
	`[${formatTimestamp(message.sentAt)}] #${message.id} ${formatSpeaker(message)}: ${message.text
		.split("\n")
		.join("\n    ")}`;

/**
 * Format a message window, oldest first, one message per line.
 */
export const formatTranscript = (messages: readonly ChatMessage[]): string =>
	messages.length === 0 ? "(no messages)" : messages.map(formatMessage).join("\n");
