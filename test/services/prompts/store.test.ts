/**
 * @fileoverview Tests for the prompt template store.
 *
 * Runs against an in-memory file system holding the prompts directory.
 */

import { describe, it } from "@effect/vitest";
import { Effect, Layer } from "effect";
import { expect } from "vitest";
import {
	PromptStore,
	PromptStoreLive,
	placeholders,
	renderTemplate,
} from "../../../src/services/prompts/index.js";
import { TestConfigLive, TestPromptStoreLive, memoryFileSystem, promptFiles } from "../../test-utils.js";

describe("placeholders", () => {
	it("lists identifiers in order of first use", () => {
		expect(placeholders("{b} and {a}, again {b}")).toEqual(["b", "a"]);
	});

	it("ignores braces that are not identifiers", () => {
		expect(placeholders('Answer as {"reply": "..."} for {name}')).toEqual(["name"]);
	});
});

describe("renderTemplate", () => {
	const template = { name: "greeting", role: "user" as const, content: "Hello {name}, {name}!" };

	it.effect("substitutes every occurrence", () =>
		Effect.gen(function* () {
			const result = yield* renderTemplate(template, { name: "Ann" });
			expect(result).toBe("Hello Ann, Ann!");
		}),
	);

	it.effect("fails on an unknown placeholder", () =>
		Effect.gen(function* () {
			const error = yield* Effect.flip(renderTemplate(template, {}));
			expect(error._tag).toBe("PromptError");
			expect(error.name).toBe("greeting");
			expect(error.message).toBe("Template 'greeting' references unknown placeholder(s): name");
		}),
	);

	it.effect("does not resolve placeholders from the object prototype", () =>
		Effect.gen(function* () {
			const error = yield* Effect.flip(
				renderTemplate(
					{ name: "greeting", role: "user", content: "Hi {constructor} {toString}" },
					{},
				),
			);
			expect(error.message).toBe(
				"Template 'greeting' references unknown placeholder(s): constructor, toString",
			);
		}),
	);
});

describe("PromptStore", () => {
	it.effect("loads the templates in file name order", () =>
		Effect.gen(function* () {
			const store = yield* PromptStore;
			const snapshot = yield* store.snapshot();

			expect(snapshot.version).toBe(1);
			expect(snapshot.loadedAt).toEqual(new Date(0));
			expect([...snapshot.templates.keys()]).toEqual(["suggest_reply", "system"]);
			expect(snapshot.templates.get("system")).toEqual({
				name: "system",
				role: "system",
				content: "Reply in {language_hint}.",
			});
		}).pipe(Effect.provide(TestPromptStoreLive())),
	);

	it.effect("renders a loaded template", () =>
		Effect.gen(function* () {
			const store = yield* PromptStore;
			const text = yield* store.render("system", { language_hint: "Italian" });
			expect(text).toBe("Reply in Italian.");
		}).pipe(Effect.provide(TestPromptStoreLive())),
	);

	it.effect("fails to render a template that is not loaded", () =>
		Effect.gen(function* () {
			const store = yield* PromptStore;
			const error = yield* Effect.flip(store.render("summary", {}));
			expect(error.message).toBe("Prompt template not loaded: summary");
		}).pipe(Effect.provide(TestPromptStoreLive())),
	);

	it.effect("refuses to start without the required templates", () =>
		Effect.gen(function* () {
			const files = new Map([["prompts/system.json", promptFiles().get("prompts/system.json") ?? ""]]);
			const layer = PromptStoreLive.pipe(
				Layer.provide(TestConfigLive),
				Layer.provide(memoryFileSystem(files)),
			);

			const error = yield* Effect.flip(Layer.build(layer));
			expect(error.message).toBe("Missing required prompt file(s) in prompts: suggest_reply.json");
		}).pipe(Effect.scoped),
	);

	it.effect("reports an invalid template file", () =>
		Effect.gen(function* () {
			const files = promptFiles();
			files.set("prompts/system.json", JSON.stringify({ role: "assistant", content: "x" }));
			const layer = PromptStoreLive.pipe(
				Layer.provide(TestConfigLive),
				Layer.provide(memoryFileSystem(files)),
			);

			const error = yield* Effect.flip(Layer.build(layer));
			expect(error.name).toBe("system");
			expect(error.message.startsWith("Invalid system.json: ")).toBe(true);
		}).pipe(Effect.scoped),
	);

	it.effect("reload picks up edited files and bumps the version", () => {
		const files = promptFiles();
		return Effect.gen(function* () {
			const store = yield* PromptStore;
			files.set("prompts/system.json", JSON.stringify({ role: "system", content: "Be brief." }));

			const snapshot = yield* store.reload();

			expect(snapshot.version).toBe(2);
			expect(yield* store.currentVersion()).toBe(2);
			expect(yield* store.render("system", {})).toBe("Be brief.");
		}).pipe(Effect.provide(TestPromptStoreLive(files)));
	});

	it.effect("a failed reload keeps the previous snapshot", () => {
		const files = promptFiles();
		return Effect.gen(function* () {
			const store = yield* PromptStore;
			files.delete("prompts/suggest_reply.json");

			const error = yield* Effect.flip(store.reload());
			expect(error._tag).toBe("PromptError");

			const snapshot = yield* store.snapshot();
			expect(snapshot.version).toBe(1);
			expect(yield* store.currentVersion()).toBe(1);
			expect(snapshot.templates.has("suggest_reply")).toBe(true);
		}).pipe(Effect.provide(TestPromptStoreLive(files)));
	});

	it.effect("save writes the file and reloads", () => {
		const files = promptFiles();
		return Effect.gen(function* () {
			const store = yield* PromptStore;

			const snapshot = yield* store.save("system", { role: "system", content: "Reply in {language_hint}!" });

			expect(files.get("prompts/system.json")).toBe(
				'{\n  "role": "system",\n  "content": "Reply in {language_hint}!"\n}\n',
			);
			expect(snapshot.version).toBe(2);
			expect(yield* store.render("system", { language_hint: "French" })).toBe("Reply in French!");
		}).pipe(Effect.provide(TestPromptStoreLive(files)));
	});

	it.effect("save rejects names outside the allowed pattern", () => {
		const files = promptFiles();
		return Effect.gen(function* () {
			const store = yield* PromptStore;

			const error = yield* Effect.flip(store.save("../escape", { role: "user", content: "x" }));

			expect(error.message).toBe("Invalid prompt name: ../escape");
			expect(files.size).toBe(2);
		}).pipe(Effect.provide(TestPromptStoreLive(files)));
	});
});
