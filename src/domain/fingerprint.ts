/**
 * Change detection over a chat's recent message window.
 *
 * @module
 */

import * as Crypto from "node:crypto";
import type { Chat, ChatMessage } from "./chat.js";

/** Fingerprint of an empty window. Never counts as a change. */
export const EMPTY_FINGERPRINT = "empty";

/**
 * Deterministic, order-sensitive digest of a message window.
 * Covers each message's id and text, so an edit changes it too. Each message
 * is hashed as a JSON pair, so no text can pass for a message boundary.
 */
export const fingerprint = (messages: readonly Pick<ChatMessage, "id" | "text">[]): string => {
	if (messages.length === 0) {
		return EMPTY_FINGERPRINT;
	}
	const hash = Crypto.createHash("sha256");
	for (const message of messages) {
		hash.update(`${JSON.stringify([message.id, message.text])}\n`);
	}
	return hash.digest("hex");
};

/**
 * Whether the window behind `current` differs from what the chat last produced a suggestion for.
 */
export const hasChanged = (chat: Pick<Chat, "lastFingerprint">, current: string): boolean => {
	if (current === EMPTY_FINGERPRINT) {
		return false;
	}
	return chat.lastFingerprint === null || chat.lastFingerprint !== current;
};
