/**
 * Chat domain types.
 * A chat is a conversation on the messaging platform that the operator may monitor.
 *
 * @module
 */

/**
 * A monitored conversation as stored locally.
 */
export interface Chat {
	/** Platform identifier, kept as text (platform ids exceed 2^53) */
	readonly id: string;
	readonly title: string;
	/** Optional hint for the reply language, passed through to the prompt */
	readonly languageHint: string | null;
	readonly isSelected: boolean;
	/** Fingerprint of the window that produced the last suggestion */
	readonly lastFingerprint: string | null;
	readonly lastSuccessfulRunAt: Date | null;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

/**
 * A single text message fetched from the platform.
 */
export interface ChatMessage {
	readonly id: string;
	readonly text: string;
	/** True when sent from the operator's own account */
	readonly outgoing: boolean;
	readonly sender: string;
	readonly sentAt: Date;
}

export type DialogKind = "user" | "group" | "channel";

/**
 * A dialog as listed by the platform, used to populate the chats table.
 */
export interface Dialog {
	readonly id: string;
	readonly title: string;
	readonly kind: DialogKind;
}
