/**
 * @fileoverview Tests for ChatRepository.
 *
 * Uses in-memory SQLite for real database behavior without persistence.
 */

import { describe, it } from "@effect/vitest";
import { Effect, Option } from "effect";
import { expect } from "vitest";
import { ChatRepository } from "../../../src/db/index.js";
import type { Dialog } from "../../../src/domain/chat.js";
import { T0, TestDatabaseLive, insertSuggestion } from "../../test-utils.js";

const T1 = new Date("2024-05-01T11:00:00.000Z");

const dialogs: readonly Dialog[] = [
	{ id: "100", title: "carol", kind: "user" },
	{ id: "-200", title: "Book club", kind: "group" },
	{ id: "300", title: "Alice", kind: "user" },
];

describe("ChatRepository", () => {
	describe("upsertDialogs", () => {
		it.effect("inserts unknown dialogs as unselected chats", () =>
			Effect.gen(function* () {
				const repo = yield* ChatRepository;
				yield* repo.upsertDialogs(dialogs, T0);

				const chats = yield* repo.listAll();
				expect(chats.map((chat) => chat.title)).toEqual(["Alice", "Book club", "carol"]);

				const alice = chats[0];
				expect(alice).toEqual({
					id: "300",
					title: "Alice",
					languageHint: null,
					isSelected: false,
					lastFingerprint: null,
					lastSuccessfulRunAt: null,
					createdAt: T0,
					updatedAt: T0,
				});
			}).pipe(Effect.provide(TestDatabaseLive)),
		);

		it.effect("refreshes titles without touching selection or pipeline state", () =>
			Effect.gen(function* () {
				const repo = yield* ChatRepository;
				yield* repo.upsertDialogs(dialogs, T0);
				yield* repo.setSelection(["300"], T0);
				yield* insertSuggestion({ id: "300" }, { fingerprint: "fp-1" });

				yield* repo.upsertDialogs([{ id: "300", title: "Alice Smith", kind: "user" }], T1);

				const chat = yield* repo.getById("300");
				expect(Option.map(chat, (found) => found.title)).toEqual(Option.some("Alice Smith"));
				expect(Option.map(chat, (found) => found.isSelected)).toEqual(Option.some(true));
				expect(Option.map(chat, (found) => found.lastFingerprint)).toEqual(Option.some("fp-1"));
				expect(Option.map(chat, (found) => found.createdAt)).toEqual(Option.some(T0));
				expect(Option.map(chat, (found) => found.updatedAt)).toEqual(Option.some(T1));
			}).pipe(Effect.provide(TestDatabaseLive)),
		);
	});

	describe("setSelection", () => {
		it.effect("replaces the selection and ignores unknown ids", () =>
			Effect.gen(function* () {
				const repo = yield* ChatRepository;
				yield* repo.upsertDialogs(dialogs, T0);

				expect(yield* repo.setSelection(["100", "-200"], T0)).toBe(2);
				expect(yield* repo.setSelection(["-200", "999"], T1)).toBe(1);

				const selected = yield* repo.listSelected();
				expect(selected.map((chat) => chat.id)).toEqual(["-200"]);
			}).pipe(Effect.provide(TestDatabaseLive)),
		);

		it.effect("lists selected chats first", () =>
			Effect.gen(function* () {
				const repo = yield* ChatRepository;
				yield* repo.upsertDialogs(dialogs, T0);
				yield* repo.setSelection(["100"], T0);

				const chats = yield* repo.listAll();
				expect(chats.map((chat) => chat.id)).toEqual(["100", "300", "-200"]);
			}).pipe(Effect.provide(TestDatabaseLive)),
		);

		it.effect("clears the selection with an empty list", () =>
			Effect.gen(function* () {
				const repo = yield* ChatRepository;
				yield* repo.upsertDialogs(dialogs, T0);
				yield* repo.setSelection(["100", "300"], T0);

				expect(yield* repo.setSelection([], T1)).toBe(0);
				expect(yield* repo.listSelected()).toEqual([]);
			}).pipe(Effect.provide(TestDatabaseLive)),
		);
	});

	describe("setLanguageHint", () => {
		it.effect("sets and clears the hint", () =>
			Effect.gen(function* () {
				const repo = yield* ChatRepository;
				yield* repo.upsertDialogs(dialogs, T0);

				const set = yield* repo.setLanguageHint("100", "Spanish", T1);
				expect(Option.map(set, (chat) => chat.languageHint)).toEqual(Option.some("Spanish"));
				expect(Option.map(set, (chat) => chat.updatedAt)).toEqual(Option.some(T1));

				const cleared = yield* repo.setLanguageHint("100", null, T1);
				expect(Option.map(cleared, (chat) => chat.languageHint)).toEqual(Option.some(null));
			}).pipe(Effect.provide(TestDatabaseLive)),
		);

		it.effect("returns None for an unknown chat", () =>
			Effect.gen(function* () {
				const repo = yield* ChatRepository;
				const result = yield* repo.setLanguageHint("404", "Spanish", T1);
				expect(Option.isNone(result)).toBe(true);
			}).pipe(Effect.provide(TestDatabaseLive)),
		);
	});

	describe("getById", () => {
		it.effect("returns None for an unknown chat", () =>
			Effect.gen(function* () {
				const repo = yield* ChatRepository;
				expect(Option.isNone(yield* repo.getById("missing"))).toBe(true);
			}).pipe(Effect.provide(TestDatabaseLive)),
		);
	});
});
