/**
 * @fileoverview Tests for the dashboard API routes.
 *
 * Requests go through the router with an in-memory database, the real
 * decision service and prompt store, and fakes for the chat platform and
 * the scheduler.
 */

import { HttpServerRequest, type HttpServerResponse } from "@effect/platform";
import { describe, it } from "@effect/vitest";
import { Effect, Layer, Option } from "effect";
import { expect } from "vitest";
import { router } from "../../src/api/routes.js";
import { TransportError } from "../../src/domain/errors.js";
import { ChatClient } from "../../src/services/chat/index.js";
import { DecisionServiceLive } from "../../src/services/decisions/index.js";
import { Scheduler, type TickReport } from "../../src/services/scheduler/index.js";
import {
	type FakeChatState,
	T0,
	TEST_SETTINGS,
	TestConfigLive,
	TestDatabaseLive,
	TestPromptStoreLive,
	fakeChatClient,
	insertSuggestion,
	makeFakeChatState,
	promptFiles,
	seedChats,
} from "../test-utils.js";

// =============================================================================
// Test Harness
// =============================================================================

const REPORT: TickReport = {
	trigger: "manual",
	startedAt: T0,
	finishedAt: new Date(T0.getTime() + 1500),
	pollIntervalMinutes: 5,
	outcomes: [{ chatId: "1", result: "skipped", detail: "UnchangedError" }],
	created: 0,
	skipped: 1,
	failed: 0,
	interrupted: false,
};

interface Harness {
	readonly chat: FakeChatState;
	readonly files: Map<string, string>;
	wakes: number;
}

const makeHarness = (): Harness => ({
	chat: makeFakeChatState(),
	files: promptFiles(),
	wakes: 0,
});

const makeTestLayer = (harness: Harness) =>
	Layer.mergeAll(
		DecisionServiceLive,
		Layer.succeed(Scheduler, {
			runNow: () => Effect.succeed(REPORT),
			wake: () =>
				Effect.sync(() => {
					harness.wakes++;
				}),
			status: () =>
				Effect.succeed({
					state: "idle" as const,
					lastReport: Option.some(REPORT),
					nextTickAt: Option.some(new Date(T0.getTime() + 300_000)),
				}),
		}),
	).pipe(
		Layer.provideMerge(
			Layer.mergeAll(
				TestDatabaseLive,
				TestConfigLive,
				TestPromptStoreLive(harness.files),
				Layer.succeed(ChatClient, fakeChatClient(harness.chat)),
			),
		),
	);

const request = (method: string, path: string, body?: unknown) =>
	router.pipe(
		Effect.provideService(
			HttpServerRequest.HttpServerRequest,
			HttpServerRequest.fromWeb(
				new Request(`http://localhost${path}`, {
					method,
					headers: { "content-type": "application/json" },
					body: body === undefined ? undefined : JSON.stringify(body),
				}),
			),
		),
	);

const readJson = (response: HttpServerResponse.HttpServerResponse): unknown =>
	response.body._tag === "Uint8Array"
		? JSON.parse(new TextDecoder().decode(response.body.body))
		: undefined;

// =============================================================================
// Health
// =============================================================================

describe("GET /health", () => {
	it.effect("reports ok", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			const response = yield* request("GET", "/health");

			expect(response.status).toBe(200);
			expect(readJson(response)).toEqual({ status: "ok", version: "0.1.0" });
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});
});

// =============================================================================
// Suggestions
// =============================================================================

describe("suggestion routes", () => {
	it.effect("lists suggestions with their chat title", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			yield* seedChats([["1", "Alice"]]);
			yield* insertSuggestion({ id: "1" });

			const response = yield* request("GET", "/api/v1/suggestions");

			expect(response.status).toBe(200);
			expect(readJson(response)).toEqual({
				total: 1,
				suggestions: [
					{
						id: 1,
						chatId: "1",
						chatTitle: "Alice",
						suggestedText: "Hi",
						translatedText: "Привет",
						status: "pending",
						sourceMessages: [
							{ id: "1", text: "Hey!", outgoing: false, sender: "1001", sentAt: "2024-05-01T09:01:00.000Z" },
							{
								id: "2",
								text: "Are you free tomorrow?",
								outgoing: false,
								sender: "1001",
								sentAt: "2024-05-01T09:02:00.000Z",
							},
							{ id: "3", text: "Let me know", outgoing: false, sender: "1001", sentAt: "2024-05-01T09:03:00.000Z" },
						],
						replyToMessageId: null,
						createdAt: "2024-05-01T10:00:00.000Z",
						decidedAt: null,
					},
				],
			});
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("rejects an unknown status filter", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			const response = yield* request("GET", "/api/v1/suggestions?status=archived");

			expect(response.status).toBe(400);
			expect(readJson(response)).toEqual({
				error: { code: "VALIDATION_ERROR", message: "Unknown status: archived" },
			});
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("filters by status", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			yield* seedChats([["1", "Alice"]]);
			yield* insertSuggestion({ id: "1" });

			const response = yield* request("GET", "/api/v1/suggestions?status=sent");

			expect(readJson(response)).toEqual({ suggestions: [], total: 0 });
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("send posts the reply and a second send conflicts", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			yield* seedChats([["1", "Alice"]]);
			yield* insertSuggestion({ id: "1" });

			const first = yield* request("POST", "/api/v1/suggestions/1/send");
			expect(first.status).toBe(200);
			expect(readJson(first)).toMatchObject({
				id: 1,
				chatTitle: "Alice",
				status: "sent",
				decidedAt: "1970-01-01T00:00:00.000Z",
			});
			expect(harness.chat.posted).toEqual([{ chatId: "1", text: "Hi" }]);

			const second = yield* request("POST", "/api/v1/suggestions/1/send");
			expect(second.status).toBe(409);
			expect(readJson(second)).toEqual({
				error: { code: "INVALID_STATE", message: "Cannot send suggestion 1: status is 'sent'" },
			});
			expect(harness.chat.posted).toHaveLength(1);
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("send-reply answers the stored reply target", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			yield* seedChats([["1", "Alice"]]);
			yield* insertSuggestion({ id: "1" }, { replyToMessageId: "3" });

			const response = yield* request("POST", "/api/v1/suggestions/1/send-reply");

			expect(response.status).toBe(200);
			expect(readJson(response)).toMatchObject({ id: 1, status: "sent", replyToMessageId: "3" });
			expect(harness.chat.posted).toEqual([{ chatId: "1", text: "Hi", replyTo: "3" }]);
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("send-reply falls back to the question in the window", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			yield* seedChats([["1", "Alice"]]);
			yield* insertSuggestion({ id: "1" });

			const response = yield* request("POST", "/api/v1/suggestions/1/send-reply");

			expect(response.status).toBe(200);
			expect(harness.chat.posted).toEqual([{ chatId: "1", text: "Hi", replyTo: "2" }]);
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("decline marks the suggestion declined", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			yield* seedChats([["1", "Alice"]]);
			yield* insertSuggestion({ id: "1" });

			const response = yield* request("POST", "/api/v1/suggestions/1/decline");

			expect(response.status).toBe(200);
			expect(readJson(response)).toMatchObject({ id: 1, status: "declined" });
			expect(harness.chat.posted).toEqual([]);
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("returns 404 for an unknown suggestion", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			const response = yield* request("POST", "/api/v1/suggestions/99/decline");

			expect(response.status).toBe(404);
			expect(readJson(response)).toEqual({
				error: { code: "NOT_FOUND", message: "suggestion not found: 99" },
			});
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("returns 400 for a malformed id", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			const response = yield* request("POST", "/api/v1/suggestions/abc/send");

			expect(response.status).toBe(400);
			expect(readJson(response)).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("returns 502 and keeps the suggestion pending when posting fails", () => {
		const harness = makeHarness();
		harness.chat.failures.set(
			"1",
			new TransportError({ source: "chat", kind: "network", message: "connection reset" }),
		);
		return Effect.gen(function* () {
			yield* seedChats([["1", "Alice"]]);
			yield* insertSuggestion({ id: "1" });

			const response = yield* request("POST", "/api/v1/suggestions/1/send");
			expect(response.status).toBe(502);
			expect(readJson(response)).toEqual({
				error: { code: "CHAT_ERROR", message: "Failed to send message: connection reset" },
			});

			const list = yield* request("GET", "/api/v1/suggestions?status=pending");
			expect(readJson(list)).toMatchObject({ total: 1 });
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});
});

// =============================================================================
// Settings
// =============================================================================

describe("settings routes", () => {
	it.effect("returns the stored settings", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			yield* seedChats([]);

			const response = yield* request("GET", "/api/v1/settings");

			expect(response.status).toBe(200);
			expect(readJson(response)).toEqual(TEST_SETTINGS);
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("saves new settings and wakes the scheduler", () => {
		const harness = makeHarness();
		const updated = {
			pollIntervalMinutes: 1,
			messagesPerCycle: 10,
			maxPendingPerChat: 2,
			cooldownMinutes: 15,
		};
		return Effect.gen(function* () {
			yield* seedChats([]);

			const response = yield* request("PUT", "/api/v1/settings", updated);

			expect(response.status).toBe(200);
			expect(readJson(response)).toEqual(updated);
			expect(harness.wakes).toBe(1);
			expect(readJson(yield* request("GET", "/api/v1/settings"))).toEqual(updated);
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("rejects out-of-range values without saving", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			yield* seedChats([]);

			const response = yield* request("PUT", "/api/v1/settings", {
				...TEST_SETTINGS,
				pollIntervalMinutes: 0,
			});

			expect(response.status).toBe(400);
			expect(readJson(response)).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
			expect(harness.wakes).toBe(0);
			expect(readJson(yield* request("GET", "/api/v1/settings"))).toEqual(TEST_SETTINGS);
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});
});

// =============================================================================
// Chats
// =============================================================================

describe("chat routes", () => {
	it.effect("replaces the selection", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			yield* seedChats([
				["1", "Alice"],
				["2", "Bob"],
			]);

			const response = yield* request("PUT", "/api/v1/chats/selection", { chatIds: ["2"] });

			expect(response.status).toBe(200);
			expect(readJson(response)).toMatchObject({
				selected: 1,
				chats: [
					{ id: "2", isSelected: true },
					{ id: "1", isSelected: false },
				],
			});
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("sets and clears the language hint", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			yield* seedChats([["1", "Alice"]]);

			const set = yield* request("PUT", "/api/v1/chats/1/language", { languageHint: "  Spanish " });
			expect(set.status).toBe(200);
			expect(readJson(set)).toEqual({
				id: "1",
				title: "Alice",
				languageHint: "Spanish",
				isSelected: true,
				lastSuccessfulRunAt: null,
				updatedAt: "1970-01-01T00:00:00.000Z",
			});

			const cleared = yield* request("PUT", "/api/v1/chats/1/language", { languageHint: "" });
			expect(readJson(cleared)).toMatchObject({ languageHint: null });
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("returns 404 for the language of an unknown chat", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			const response = yield* request("PUT", "/api/v1/chats/9/language", { languageHint: null });

			expect(response.status).toBe(404);
			expect(readJson(response)).toEqual({
				error: { code: "NOT_FOUND", message: "chat not found: 9" },
			});
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("syncs dialogs from the chat platform", () => {
		const harness = makeHarness();
		harness.chat.dialogs = [
			{ id: "1", title: "Alice Smith", kind: "user" },
			{ id: "2", title: "Book club", kind: "group" },
		];
		return Effect.gen(function* () {
			yield* seedChats([["1", "Alice"]]);

			const response = yield* request("POST", "/api/v1/chats/sync");

			expect(response.status).toBe(200);
			expect(readJson(response)).toMatchObject({
				synced: 2,
				chats: [
					{ id: "1", title: "Alice Smith", isSelected: true },
					{ id: "2", title: "Book club", isSelected: false },
				],
			});
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});
});

// =============================================================================
// Prompts
// =============================================================================

describe("prompt routes", () => {
	it.effect("lists the loaded templates", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			const response = yield* request("GET", "/api/v1/prompts");

			expect(readJson(response)).toEqual({
				version: 1,
				loadedAt: "1970-01-01T00:00:00.000Z",
				prompts: [
					{
						name: "suggest_reply",
						role: "user",
						content: "Chat: {chat_title} ({message_count})\n{transcript}",
					},
					{ name: "system", role: "system", content: "Reply in {language_hint}." },
				],
			});
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("saves a template and wakes the scheduler", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			const response = yield* request("PUT", "/api/v1/prompts/system", {
				role: "system",
				content: "Be brief.",
			});

			expect(response.status).toBe(200);
			expect(readJson(response)).toMatchObject({ version: 2 });
			expect(harness.files.get("prompts/system.json")).toBe(
				'{\n  "role": "system",\n  "content": "Be brief."\n}\n',
			);
			expect(harness.wakes).toBe(1);
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("rejects an invalid template name", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			const response = yield* request("PUT", "/api/v1/prompts/BadName", {
				role: "user",
				content: "x",
			});

			expect(response.status).toBe(422);
			expect(readJson(response)).toEqual({
				error: { code: "PROMPT_ERROR", message: "Invalid prompt name: BadName" },
			});
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("rejects a template body with an unknown role", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			const response = yield* request("PUT", "/api/v1/prompts/system", {
				role: "assistant",
				content: "x",
			});

			expect(response.status).toBe(400);
			expect(readJson(response)).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
			expect(harness.wakes).toBe(0);
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("a failed reload reports the problem", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			harness.files.delete("prompts/system.json");

			const response = yield* request("POST", "/api/v1/prompts/reload");

			expect(response.status).toBe(422);
			expect(readJson(response)).toEqual({
				error: {
					code: "PROMPT_ERROR",
					message: "Missing required prompt file(s) in prompts: system.json",
				},
			});
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});
});

// =============================================================================
// Scheduler
// =============================================================================

describe("scheduler routes", () => {
	const reportJson = {
		trigger: "manual",
		startedAt: "2024-05-01T10:00:00.000Z",
		finishedAt: "2024-05-01T10:00:01.500Z",
		pollIntervalMinutes: 5,
		created: 0,
		skipped: 1,
		failed: 0,
		interrupted: false,
		outcomes: [{ chatId: "1", result: "skipped", detail: "UnchangedError" }],
	};

	it.effect("reports the scheduler status", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			const response = yield* request("GET", "/api/v1/scheduler");

			expect(readJson(response)).toEqual({
				state: "idle",
				nextTickAt: "2024-05-01T10:05:00.000Z",
				lastReport: reportJson,
			});
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});

	it.effect("runs a tick on demand", () => {
		const harness = makeHarness();
		return Effect.gen(function* () {
			const response = yield* request("POST", "/api/v1/scheduler/run");

			expect(response.status).toBe(200);
			expect(readJson(response)).toEqual(reportJson);
		}).pipe(Effect.provide(makeTestLayer(harness)));
	});
});
