/**
 * @fileoverview Chat platform client interface.
 *
 * The pipeline only needs three operations from the messaging platform;
 * the live implementation lives in telegram.ts.
 */

import { Context, type Effect } from "effect";
import type { ChatMessage, Dialog } from "../../domain/chat.js";
import type { TransportError } from "../../domain/errors.js";

export interface ChatClientService {
	/**
	 * The last `count` text messages of the chat, oldest first.
	 * Media-only messages are skipped, so fewer may be returned.
	 */
	readonly fetchRecent: (
		chatId: string,
		count: number,
	) => Effect.Effect<readonly ChatMessage[], TransportError>;

	/**
	 * Posts a text message to the chat as the operator's account, as a reply
	 * to message `replyTo` when given.
	 */
	readonly postMessage: (
		chatId: string,
		text: string,
		replyTo?: string,
	) => Effect.Effect<void, TransportError>;

	/** The operator's dialogs, most recent first. */
	readonly listDialogs: (limit: number) => Effect.Effect<readonly Dialog[], TransportError>;
}

export class ChatClient extends Context.Tag("reply-drafter/ChatClient")<
	ChatClient,
	ChatClientService
>() {}
