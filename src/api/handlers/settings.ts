/**
 * @fileoverview Settings endpoints.
 */

import { HttpServerRequest, HttpServerResponse } from "@effect/platform";
import { Clock, Effect } from "effect";
import { SettingsRepository } from "../../db/index.js";
import { SettingsSchema } from "../../domain/settings.js";
import { Scheduler } from "../../services/scheduler/index.js";
import { errorResponse, internalError, validationError } from "../responses.js";

/**
 * GET /api/v1/settings
 */
export const getSettingsHandler = Effect.gen(function* () {
	const settingsRepo = yield* SettingsRepository;
	const settings = yield* settingsRepo.get();
	return yield* HttpServerResponse.json(settings);
}).pipe(Effect.catchTag("PersistenceError", internalError));

/**
 * PUT /api/v1/settings
 *
 * Replaces all settings. The scheduler picks up a new poll interval at once.
 */
export const updateSettingsHandler = Effect.gen(function* () {
	const settingsRepo = yield* SettingsRepository;
	const scheduler = yield* Scheduler;

	const settings = yield* HttpServerRequest.schemaBodyJson(SettingsSchema);
	const now = new Date(yield* Clock.currentTimeMillis);
	const saved = yield* settingsRepo.save(settings, now);
	yield* scheduler.wake();

	yield* Effect.logInfo("Settings updated", saved);
	return yield* HttpServerResponse.json(saved);
}).pipe(
	Effect.catchTags({
		ParseError: validationError,
		RequestError: (error) => errorResponse(400, "VALIDATION_ERROR", error.message),
		PersistenceError: internalError,
	}),
);
