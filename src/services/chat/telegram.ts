/**
 * @fileoverview Telegram implementation of ChatClient, using a user-account
 * session through GramJS.
 *
 * The client connects once when the layer is built and disconnects when the
 * layer's scope closes. Every call is bounded by `telegram.timeout_seconds`.
 */

import bigInt from "big-integer";
import { TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions/index.js";
import { Duration, Effect, Layer, Redacted } from "effect";
import { Config } from "../../config/index.js";
import type { ChatMessage, Dialog } from "../../domain/chat.js";
import { TransportError } from "../../domain/errors.js";
import { ChatClient, type ChatClientService } from "./client.js";

// =============================================================================
// Error Mapping
// =============================================================================

const errorCode = (error: unknown): number | undefined =>
	typeof error === "object" && error !== null && "code" in error && typeof error.code === "number"
		? error.code
		: undefined;

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Maps a GramJS failure to a TransportError.
 * RPC code 401 is an unusable session, 420 is FLOOD_WAIT.
 */
export const toTransportError = (operation: string, error: unknown): TransportError => {
	const code = errorCode(error);
	const kind = code === 401 ? "auth" : code === 420 ? "rate_limit" : "network";
	return new TransportError({
		source: "chat",
		kind,
		message: `Telegram ${operation} failed: ${errorMessage(error)}`,
		cause: error,
	});
};

// =============================================================================
// Implementation
// =============================================================================

const toEntity = (chatId: string) => bigInt(chatId);

const make = Effect.gen(function* () {
	const { telegram } = yield* Config;
	const timeout = Duration.seconds(telegram.timeoutSeconds);

	/**
	 * Runs a GramJS call with the configured timeout.
	 */
	const call = <A>(operation: string, run: () => Promise<A>): Effect.Effect<A, TransportError> =>
		Effect.tryPromise({
			try: run,
			catch: (error) => toTransportError(operation, error),
		}).pipe(
			Effect.timeoutFail({
				duration: timeout,
				onTimeout: () =>
					new TransportError({
						source: "chat",
						kind: "timeout",
						message: `Telegram ${operation} timed out after ${telegram.timeoutSeconds}s`,
					}),
			}),
		);

	const client = yield* Effect.acquireRelease(
		Effect.sync(
			() =>
				new TelegramClient(
					new StringSession(Redacted.value(telegram.session)),
					telegram.apiId,
					Redacted.value(telegram.apiHash),
					{ connectionRetries: 5 },
				),
		).pipe(Effect.tap((created) => call("connect", () => created.connect()))),
		(connected) =>
			call("disconnect", () => connected.disconnect()).pipe(
				Effect.catchAll((error) => Effect.logWarning("Telegram disconnect failed", { error })),
			),
	);

	const authorized = yield* call("checkAuthorization", () => client.checkAuthorization());
	if (!authorized) {
		return yield* Effect.fail(
			new TransportError({
				source: "chat",
				kind: "auth",
				message: "Telegram session is not authorized; create a new session string",
			}),
		);
	}

	// GramJS resolves numeric ids through its entity cache, which a StringSession
	// does not persist. Listing dialogs once fills it.
	yield* call("getDialogs", () => client.getDialogs({ limit: telegram.dialogsLimit }));
	yield* Effect.logInfo("Connected to Telegram");

	const fetchRecent: ChatClientService["fetchRecent"] = (chatId, count) =>
		call("getMessages", () => client.getMessages(toEntity(chatId), { limit: count })).pipe(
			Effect.map((messages) =>
				messages
					.filter((message) => typeof message.message === "string" && message.message.length > 0)
					.map(
						(message): ChatMessage => ({
							id: String(message.id),
							text: message.message,
							outgoing: message.out === true,
							sender: message.out ? "me" : (message.senderId?.toString() ?? "unknown"),
							sentAt: new Date(message.date * 1000),
						}),
					)
					// GramJS returns newest first
					.reverse(),
			),
		);

	const postMessage: ChatClientService["postMessage"] = (chatId, text, replyTo) =>
		call("sendMessage", () =>
			client.sendMessage(toEntity(chatId), {
				message: text,
				replyTo: replyTo === undefined ? undefined : Number(replyTo),
			}),
		).pipe(Effect.asVoid);

	const listDialogs: ChatClientService["listDialogs"] = (limit) =>
		call("getDialogs", () => client.getDialogs({ limit })).pipe(
			Effect.map((dialogs) =>
				dialogs.flatMap((dialog): Dialog[] => {
					if (dialog.id === undefined) {
						return [];
					}
					const id = dialog.id.toString();
					return [
						{
							id,
							title: dialog.title || dialog.name || id,
							kind: dialog.isUser ? "user" : dialog.isGroup ? "group" : "channel",
						},
					];
				}),
			),
		);

	return { fetchRecent, postMessage, listDialogs } satisfies ChatClientService;
});

/**
 * Live ChatClient backed by a Telegram user session. Requires Config.
 */
export const TelegramChatClientLive: Layer.Layer<ChatClient, TransportError, Config> =
	Layer.scoped(ChatClient, make);
