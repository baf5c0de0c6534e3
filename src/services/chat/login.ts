/**
 * @fileoverview Interactive Telegram sign-in producing a session string for
 * `telegram.session`.
 */

import { Api, TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions/index.js";
import { Effect, Redacted, Runtime, type Scope } from "effect";
import type { LoginConfig } from "../../config/index.js";
import type { TransportError } from "../../domain/errors.js";
import { toTransportError } from "./telegram.js";

export interface LoginPrompts {
	/** Asks the operator a question and returns the trimmed answer. */
	readonly ask: (question: string) => Effect.Effect<string>;
}

export interface LoginResult {
	readonly account: string;
	readonly session: string;
}

/**
 * Display name of the signed-in account.
 */
export const accountName = (user: {
	readonly username?: string | undefined;
	readonly firstName?: string | undefined;
}): string => user.username || user.firstName || "<user>";

const RETRYABLE_LOGIN_ERRORS = ["PHONE_CODE_INVALID", "PHONE_CODE_EMPTY", "PASSWORD_HASH_INVALID"];

/**
 * Whether a failed sign-in step should be asked again: a mistyped code or
 * password. Anything else aborts the login.
 */
export const isRetryableLoginError = (error: Error): boolean =>
	RETRYABLE_LOGIN_ERRORS.some((code) => error.message.includes(code));

/**
 * Signs in with a fresh session, prompting for whatever the config does not
 * provide. The client is destroyed when the scope closes.
 */
export const signIn = (
	login: LoginConfig,
	prompts: LoginPrompts,
): Effect.Effect<LoginResult, TransportError, Scope.Scope> =>
	Effect.gen(function* () {
		const runPromise = Runtime.runPromise(yield* Effect.runtime<never>());
		const ask = (question: string) => () => runPromise(prompts.ask(question));

		const session = new StringSession("");
		const client = yield* Effect.acquireRelease(
			Effect.sync(
				() =>
					new TelegramClient(session, login.apiId, Redacted.value(login.apiHash), {
						connectionRetries: 5,
					}),
			),
			(created) =>
				Effect.tryPromise(() => created.destroy()).pipe(
					Effect.catchAll((error) => Effect.logWarning("Telegram shutdown failed", { error })),
				),
		);

		yield* Effect.tryPromise({
			try: () =>
				client.start({
					phoneNumber:
						login.phone ?? ask("Telegram phone (international format, e.g. +15551234567): "),
					phoneCode: ask("Login code: "),
					password: ask("Two-step verification password: "),
					onError: (error) =>
						runPromise(
							Effect.logWarning(`Login step failed: ${error.message}`).pipe(
								Effect.as(!isRetryableLoginError(error)),
							),
						),
				}),
			catch: (error) => toTransportError("login", error),
		});

		const me = yield* Effect.tryPromise({
			try: () => client.getMe(),
			catch: (error) => toTransportError("getMe", error),
		});

		return {
			account: accountName(me instanceof Api.User ? me : {}),
			session: session.save(),
		};
	});
