/**
 * @fileoverview Chat endpoints: listing, selection, language hints and
 * dialog sync from the chat platform.
 */

import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform";
import { Clock, Effect, Option, Schema } from "effect";
import { Config } from "../../config/index.js";
import { ChatRepository } from "../../db/index.js";
import { ChatClient } from "../../services/chat/index.js";
import { errorResponse, internalError, mapChat, validationError } from "../responses.js";

const SelectionBody = Schema.Struct({
	chatIds: Schema.Array(Schema.String),
});

const LanguageBody = Schema.Struct({
	languageHint: Schema.NullOr(Schema.Trim),
});

const ChatIdParams = Schema.Struct({
	id: Schema.String.pipe(Schema.minLength(1)),
});

const currentDate = Effect.map(Clock.currentTimeMillis, (millis) => new Date(millis));

/**
 * GET /api/v1/chats
 */
export const listChatsHandler = Effect.gen(function* () {
	const chatRepo = yield* ChatRepository;
	const chats = yield* chatRepo.listAll();
	return yield* HttpServerResponse.json({
		chats: chats.map(mapChat),
		total: chats.length,
	});
}).pipe(Effect.catchTag("PersistenceError", internalError));

/**
 * PUT /api/v1/chats/selection
 *
 * Body `{ chatIds: string[] }` replaces the set of monitored chats.
 */
export const updateSelectionHandler = Effect.gen(function* () {
	const chatRepo = yield* ChatRepository;
	const body = yield* HttpServerRequest.schemaBodyJson(SelectionBody);

	const selected = yield* chatRepo.setSelection(body.chatIds, yield* currentDate);
	const chats = yield* chatRepo.listAll();
	yield* Effect.logInfo(`Chat selection updated: ${selected} selected`);

	return yield* HttpServerResponse.json({
		selected,
		chats: chats.map(mapChat),
	});
}).pipe(
	Effect.catchTags({
		ParseError: validationError,
		RequestError: (error) => errorResponse(400, "VALIDATION_ERROR", error.message),
		PersistenceError: internalError,
	}),
);

/**
 * PUT /api/v1/chats/:id/language
 *
 * Body `{ languageHint: string | null }`. An empty hint clears it.
 */
export const updateLanguageHandler = Effect.gen(function* () {
	const chatRepo = yield* ChatRepository;
	const { id } = yield* HttpRouter.schemaPathParams(ChatIdParams);
	const body = yield* HttpServerRequest.schemaBodyJson(LanguageBody);

	const hint = body.languageHint === null || body.languageHint === "" ? null : body.languageHint;
	const updated = yield* chatRepo.setLanguageHint(id, hint, yield* currentDate);
	if (Option.isNone(updated)) {
		return yield* errorResponse(404, "NOT_FOUND", `chat not found: ${id}`);
	}

	return yield* HttpServerResponse.json(mapChat(updated.value));
}).pipe(
	Effect.catchTags({
		ParseError: validationError,
		RequestError: (error) => errorResponse(400, "VALIDATION_ERROR", error.message),
		PersistenceError: internalError,
	}),
);

/**
 * POST /api/v1/chats/sync
 *
 * Pulls the dialog list from the chat platform and upserts it. Existing
 * chats keep their selection and pipeline state.
 */
export const syncChatsHandler = Effect.gen(function* () {
	const config = yield* Config;
	const chatClient = yield* ChatClient;
	const chatRepo = yield* ChatRepository;

	const dialogs = yield* chatClient.listDialogs(config.telegram.dialogsLimit);
	yield* chatRepo.upsertDialogs(dialogs, yield* currentDate);
	const chats = yield* chatRepo.listAll();
	yield* Effect.logInfo(`Synced ${dialogs.length} dialog(s)`);

	return yield* HttpServerResponse.json({
		synced: dialogs.length,
		chats: chats.map(mapChat),
	});
}).pipe(
	Effect.catchTags({
		TransportError: (error) =>
			errorResponse(502, "CHAT_ERROR", `Failed to list dialogs: ${error.message}`),
		PersistenceError: internalError,
	}),
);
