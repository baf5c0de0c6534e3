/**
 * @fileoverview Prompt template endpoints.
 */

import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform";
import { Effect, Schema } from "effect";
import { PromptFileSchema, PromptStore } from "../../services/prompts/index.js";
import { Scheduler } from "../../services/scheduler/index.js";
import { errorResponse, mapPromptSnapshot, validationError } from "../responses.js";

const PromptNameParams = Schema.Struct({
	name: Schema.String,
});

/**
 * GET /api/v1/prompts
 */
export const listPromptsHandler = Effect.gen(function* () {
	const store = yield* PromptStore;
	const snapshot = yield* store.snapshot();
	return yield* HttpServerResponse.json(mapPromptSnapshot(snapshot));
});

/**
 * POST /api/v1/prompts/reload
 *
 * Re-reads every template file. On failure the loaded set stays as it was.
 */
export const reloadPromptsHandler = Effect.gen(function* () {
	const store = yield* PromptStore;
	const snapshot = yield* store.reload();
	return yield* HttpServerResponse.json(mapPromptSnapshot(snapshot));
}).pipe(
	Effect.catchTag("PromptError", (error) => errorResponse(422, "PROMPT_ERROR", error.message)),
);

/**
 * PUT /api/v1/prompts/:name
 *
 * Body `{ role, content }`. Writes the template file and reloads the set.
 */
export const savePromptHandler = Effect.gen(function* () {
	const store = yield* PromptStore;
	const scheduler = yield* Scheduler;
	const { name } = yield* HttpRouter.schemaPathParams(PromptNameParams);
	const file = yield* HttpServerRequest.schemaBodyJson(PromptFileSchema);

	const snapshot = yield* store.save(name, file);
	yield* scheduler.wake();

	return yield* HttpServerResponse.json(mapPromptSnapshot(snapshot));
}).pipe(
	Effect.catchTags({
		ParseError: validationError,
		RequestError: (error) => errorResponse(400, "VALIDATION_ERROR", error.message),
		PromptError: (error) => errorResponse(422, "PROMPT_ERROR", error.message),
	}),
);
