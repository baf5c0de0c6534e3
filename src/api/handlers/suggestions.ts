/**
 * @fileoverview Suggestion review endpoints.
 */

import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform";
import { Effect, Option, Schema } from "effect";
import { ChatRepository, SuggestionRepository } from "../../db/index.js";
import { Decision, SuggestionStatusSchema } from "../../domain/suggestion.js";
import { DecisionService } from "../../services/decisions/index.js";
import { errorResponse, internalError, mapSuggestion, validationError } from "../responses.js";

const SuggestionIdParams = Schema.Struct({
	id: Schema.NumberFromString.pipe(Schema.int(), Schema.positive()),
});

const decodeStatus = Schema.decodeUnknownOption(SuggestionStatusSchema);

/**
 * GET /api/v1/suggestions?status=pending|sent|declined
 *
 * Pending first, newest first within a status.
 */
export const listSuggestionsHandler = Effect.gen(function* () {
	const suggestionRepo = yield* SuggestionRepository;
	const chatRepo = yield* ChatRepository;
	const request = yield* HttpServerRequest.HttpServerRequest;

	const url = new URL(request.url, "http://localhost");
	const statusParam = url.searchParams.get("status");
	const status = statusParam === null ? Option.none() : decodeStatus(statusParam);
	if (statusParam !== null && Option.isNone(status)) {
		return yield* errorResponse(400, "VALIDATION_ERROR", `Unknown status: ${statusParam}`);
	}

	const suggestions = yield* suggestionRepo.list(Option.getOrUndefined(status));
	const chats = yield* chatRepo.listAll();
	const titles = new Map(chats.map((chat) => [chat.id, chat.title]));

	return yield* HttpServerResponse.json({
		suggestions: suggestions.map((suggestion) =>
			mapSuggestion(suggestion, titles.get(suggestion.chatId) ?? null),
		),
		total: suggestions.length,
	});
}).pipe(Effect.catchTag("PersistenceError", internalError));

const decisionHandler = (decision: Decision) =>
	Effect.gen(function* () {
		const decisions = yield* DecisionService;
		const chatRepo = yield* ChatRepository;
		const { id } = yield* HttpRouter.schemaPathParams(SuggestionIdParams);

		const updated = yield* decisions.applyDecision(id, decision);
		const chat = yield* chatRepo.getById(updated.chatId);

		return yield* HttpServerResponse.json(
			mapSuggestion(
				updated,
				Option.getOrNull(Option.map(chat, (found) => found.title)),
			),
		);
	}).pipe(
		Effect.catchTags({
			ParseError: validationError,
			NotFoundError: (error) => errorResponse(404, "NOT_FOUND", error.message),
			InvalidStateError: (error) => errorResponse(409, "INVALID_STATE", error.message),
			TransportError: (error) =>
				errorResponse(502, "CHAT_ERROR", `Failed to send message: ${error.message}`),
			PersistenceError: internalError,
		}),
	);

/**
 * POST /api/v1/suggestions/:id/send
 *
 * Posts the suggested text to the chat, then marks the suggestion sent.
 */
export const sendSuggestionHandler = decisionHandler(Decision.Send());

/**
 * POST /api/v1/suggestions/:id/send-reply
 *
 * Like send, but as a reply to the suggestion's reply target: the message the
 * model chose, else the best-scoring incoming source message.
 */
export const sendReplySuggestionHandler = decisionHandler(Decision.SendReply());

/**
 * POST /api/v1/suggestions/:id/decline
 */
export const declineSuggestionHandler = decisionHandler(Decision.Decline());
