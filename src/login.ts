/**
 * @fileoverview Telegram login command.
 *
 * Signs in with the [telegram] credentials of the config file, asking for the
 * phone number (unless `telegram.phone` is set), the login code and the
 * two-step password. The session string is written to `telegram.session_file`
 * when set, otherwise printed for `telegram.session`.
 */

import { createInterface } from "node:readline/promises";
import { FileSystem, Path } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Console, Effect } from "effect";
import {
	configPathFromArgs,
	describeConfigError,
	expandHomePath,
	loadLoginConfig,
} from "./config/index.js";
import { type LoginPrompts, signIn } from "./services/chat/index.js";

// =============================================================================
// Terminal Prompts
// =============================================================================

const TerminalPrompts = Effect.acquireRelease(
	Effect.sync(() => createInterface({ input: process.stdin, output: process.stdout })),
	(terminal) => Effect.sync(() => terminal.close()),
).pipe(
	Effect.map(
		(terminal): LoginPrompts => ({
			ask: (question) =>
				Effect.promise(() => terminal.question(question)).pipe(
					Effect.map((answer) => answer.trim()),
				),
		}),
	),
);

// =============================================================================
// Main Program
// =============================================================================

const program = Effect.gen(function* () {
	const login = yield* loadLoginConfig(configPathFromArgs(process.argv.slice(2))).pipe(
		Effect.catchAll((error) =>
			Effect.sync((): never => {
				for (const line of describeConfigError(error)) {
					console.error(line);
				}
				process.exit(1);
			}),
		),
	);

	const prompts = yield* TerminalPrompts;
	const result = yield* signIn(login, prompts);
	yield* Console.log(`Logged in as: ${result.account}`);

	if (login.sessionFile === undefined) {
		yield* Console.log("Set this as telegram.session in your config:");
		yield* Console.log(result.session);
		return;
	}

	const fs = yield* FileSystem.FileSystem;
	const path = yield* Path.Path;
	const target = expandHomePath(login.sessionFile);
	yield* fs.makeDirectory(path.dirname(target), { recursive: true });
	yield* fs.writeFileString(target, `${result.session}\n`, { mode: 0o600 });
	yield* Console.log(`Session saved to ${login.sessionFile}`);
}).pipe(Effect.scoped);

// =============================================================================
// Entry Point
// =============================================================================

NodeRuntime.runMain(program.pipe(Effect.provide(NodeContext.layer)));
