/**
 * @fileoverview API routes for the reply drafter dashboard.
 *
 * Defines all REST endpoints and wires up handlers.
 */

import { HttpRouter, HttpServer } from "@effect/platform";
import { Effect, Layer } from "effect";
import { Config, getDashboardCredentials } from "../config/index.js";
import { requireBasicAuth } from "./auth.js";
import {
	listChatsHandler,
	syncChatsHandler,
	updateLanguageHandler,
	updateSelectionHandler,
} from "./handlers/chats.js";
import { healthHandler } from "./handlers/health.js";
import { listPromptsHandler, reloadPromptsHandler, savePromptHandler } from "./handlers/prompts.js";
import { runSchedulerHandler, schedulerStatusHandler } from "./handlers/scheduler.js";
import { getSettingsHandler, updateSettingsHandler } from "./handlers/settings.js";
import {
	declineSuggestionHandler,
	listSuggestionsHandler,
	sendReplySuggestionHandler,
	sendSuggestionHandler,
} from "./handlers/suggestions.js";

// =============================================================================
// Router
// =============================================================================

export const router = HttpRouter.empty.pipe(
	// Health check
	HttpRouter.get("/health", healthHandler),

	// Review queue
	HttpRouter.get("/api/v1/suggestions", listSuggestionsHandler),
	HttpRouter.post("/api/v1/suggestions/:id/send", sendSuggestionHandler),
	HttpRouter.post("/api/v1/suggestions/:id/send-reply", sendReplySuggestionHandler),
	HttpRouter.post("/api/v1/suggestions/:id/decline", declineSuggestionHandler),

	// Settings
	HttpRouter.get("/api/v1/settings", getSettingsHandler),
	HttpRouter.put("/api/v1/settings", updateSettingsHandler),

	// Chats
	HttpRouter.get("/api/v1/chats", listChatsHandler),
	HttpRouter.put("/api/v1/chats/selection", updateSelectionHandler),
	HttpRouter.put("/api/v1/chats/:id/language", updateLanguageHandler),
	HttpRouter.post("/api/v1/chats/sync", syncChatsHandler),

	// Prompts
	HttpRouter.get("/api/v1/prompts", listPromptsHandler),
	HttpRouter.post("/api/v1/prompts/reload", reloadPromptsHandler),
	HttpRouter.put("/api/v1/prompts/:name", savePromptHandler),

	// Scheduler
	HttpRouter.get("/api/v1/scheduler", schedulerStatusHandler),
	HttpRouter.post("/api/v1/scheduler/run", runSchedulerHandler),
);

// =============================================================================
// Server Layer
// =============================================================================

export const ApiLive = Layer.unwrapEffect(
	Effect.gen(function* () {
		const config = yield* Config;
		const credentials = getDashboardCredentials(config);
		if (credentials === undefined) {
			yield* Effect.logWarning("Dashboard authentication is disabled");
		}
		return router.pipe(requireBasicAuth(credentials), HttpServer.serve(), HttpServer.withLogAddress);
	}),
);
