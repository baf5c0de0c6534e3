/**
 * @fileoverview Prompt template store.
 *
 * Templates live as `<prompts_dir>/<name>.json` files of the form
 * `{ "role": "system" | "user", "content": "..." }`. Content may reference
 * `{placeholder}` variables that are filled in at render time.
 *
 * The loaded templates form an immutable snapshot. Reload builds a complete
 * new snapshot and swaps it in, so renders never see a half-loaded set; a
 * failed reload keeps the previous snapshot.
 *
 * @module
 */

import * as Path from "node:path";
import { FileSystem } from "@effect/platform";
import { Clock, Context, Effect, Layer, Ref, Schema } from "effect";
import { Config } from "../../config/index.js";
import { NotFoundError, PromptError } from "../../domain/errors.js";

// =============================================================================
// Types
// =============================================================================

export const PromptRoleSchema = Schema.Literal("system", "user");

export const PromptFileSchema = Schema.Struct({
	role: PromptRoleSchema,
	content: Schema.String.pipe(Schema.minLength(1)),
});

export type PromptFile = typeof PromptFileSchema.Type;

export interface PromptTemplate extends PromptFile {
	readonly name: string;
}

export interface PromptSnapshot {
	/** Increases by one on every successful load */
	readonly version: number;
	readonly loadedAt: Date;
	readonly templates: ReadonlyMap<string, PromptTemplate>;
}

/** Templates the pipeline cannot run without. */
export const REQUIRED_PROMPTS = ["system", "suggest_reply"] as const;

const PROMPT_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;
const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const decodePromptFile = Schema.decodeUnknown(Schema.parseJson(PromptFileSchema));

// =============================================================================
// Rendering
// =============================================================================

/**
 * Names of the `{placeholder}` variables a template references, in order of first use.
 */
export const placeholders = (content: string): readonly string[] => [
	...new Set(Array.from(content.matchAll(PLACEHOLDER_PATTERN), (match) => match[1] ?? "")),
];

/**
 * Substitutes `{placeholder}` variables. Text in braces that is not an
 * identifier (such as a JSON example) is left as is.
 */
export const renderTemplate = (
	template: PromptTemplate,
	variables: Readonly<Record<string, string>>,
): Effect.Effect<string, PromptError> => {
	const missing = placeholders(template.content).filter((name) => !Object.hasOwn(variables, name));
	if (missing.length > 0) {
		return Effect.fail(
			new PromptError({
				name: template.name,
				message: `Template '${template.name}' references unknown placeholder(s): ${missing.join(", ")}`,
			}),
		);
	}
	return Effect.succeed(
		template.content.replace(PLACEHOLDER_PATTERN, (_, name: string) =>
			Object.hasOwn(variables, name) ? (variables[name] ?? "") : "",
		),
	);
};

// =============================================================================
// Service
// =============================================================================

export interface PromptStoreService {
	readonly snapshot: () => Effect.Effect<PromptSnapshot>;

	/** Version of the loaded snapshot; changes whenever a reload succeeds. */
	readonly currentVersion: () => Effect.Effect<number>;

	readonly render: (
		name: string,
		variables: Readonly<Record<string, string>>,
	) => Effect.Effect<string, PromptError>;

	/** Re-reads the prompts directory and swaps the snapshot on success. */
	readonly reload: () => Effect.Effect<PromptSnapshot, PromptError>;

	/** Writes one template file, then reloads. */
	readonly save: (name: string, file: PromptFile) => Effect.Effect<PromptSnapshot, PromptError>;

	readonly get: (name: string) => Effect.Effect<PromptTemplate, NotFoundError>;
}

export class PromptStore extends Context.Tag("reply-drafter/PromptStore")<
	PromptStore,
	PromptStoreService
>() {}

/**
 * Reads every `*.json` file in `directory` into a template map.
 */
export const loadTemplates = (
	directory: string,
): Effect.Effect<ReadonlyMap<string, PromptTemplate>, PromptError, FileSystem.FileSystem> =>
	Effect.gen(function* () {
		const fs = yield* FileSystem.FileSystem;

		const entries = yield* fs.readDirectory(directory).pipe(
			Effect.mapError(
				(error) =>
					new PromptError({
						name: directory,
						message: `Cannot read prompts directory: ${error.message}`,
					}),
			),
		);

		const templates = new Map<string, PromptTemplate>();
		for (const entry of [...entries].sort()) {
			if (!entry.endsWith(".json")) {
				continue;
			}
			const name = entry.slice(0, -".json".length);
			const raw = yield* fs.readFileString(Path.join(directory, entry)).pipe(
				Effect.mapError(
					(error) => new PromptError({ name, message: `Cannot read ${entry}: ${error.message}` }),
				),
			);
			const file = yield* decodePromptFile(raw).pipe(
				Effect.mapError(
					(error) => new PromptError({ name, message: `Invalid ${entry}: ${error.message}` }),
				),
			);
			templates.set(name, { name, ...file });
		}

		const absent = REQUIRED_PROMPTS.filter((name) => !templates.has(name));
		if (absent.length > 0) {
			return yield* Effect.fail(
				new PromptError({
					name: absent.join(", "),
					message: `Missing required prompt file(s) in ${directory}: ${absent.map((name) => `${name}.json`).join(", ")}`,
				}),
			);
		}

		return templates;
	});

const make = Effect.gen(function* () {
	const config = yield* Config;
	const fs = yield* FileSystem.FileSystem;
	const directory = config.prompts.directory;

	const lock = yield* Effect.makeSemaphore(1);
	const load = loadTemplates(directory).pipe(Effect.provideService(FileSystem.FileSystem, fs));

	const initial = yield* load;
	const current = yield* Ref.make<PromptSnapshot>({
		version: 1,
		loadedAt: new Date(yield* Clock.currentTimeMillis),
		templates: initial,
	});
	yield* Effect.logInfo(`Loaded ${initial.size} prompt template(s) from ${directory}`);

	const snapshot: PromptStoreService["snapshot"] = () => Ref.get(current);

	const currentVersion: PromptStoreService["currentVersion"] = () =>
		Ref.get(current).pipe(Effect.map((snap) => snap.version));

	const get: PromptStoreService["get"] = (name) =>
		Ref.get(current).pipe(
			Effect.flatMap((snap) => {
				const template = snap.templates.get(name);
				return template === undefined
					? Effect.fail(new NotFoundError({ entity: "prompt", id: name }))
					: Effect.succeed(template);
			}),
		);

	const render: PromptStoreService["render"] = (name, variables) =>
		get(name).pipe(
			Effect.mapError(
				(error) => new PromptError({ name, message: `Prompt template not loaded: ${error.id}` }),
			),
			Effect.flatMap((template) => renderTemplate(template, variables)),
		);

	const reloadUnlocked = Effect.gen(function* () {
		const templates = yield* load;
		const loadedAt = new Date(yield* Clock.currentTimeMillis);
		const next = yield* Ref.updateAndGet(current, (previous) => ({
			version: previous.version + 1,
			loadedAt,
			templates,
		}));
		yield* Effect.logInfo(`Prompts reloaded (version ${next.version})`);
		return next;
	});

	const reload: PromptStoreService["reload"] = () => lock.withPermits(1)(reloadUnlocked);

	const save: PromptStoreService["save"] = (name, file) =>
		lock.withPermits(1)(
			Effect.gen(function* () {
				if (!PROMPT_NAME_PATTERN.test(name)) {
					return yield* Effect.fail(
						new PromptError({ name, message: `Invalid prompt name: ${name}` }),
					);
				}
				const path = Path.join(directory, `${name}.json`);
				yield* fs
					.writeFileString(path, `${JSON.stringify(file, null, 2)}\n`)
					.pipe(
						Effect.mapError(
							(error) => new PromptError({ name, message: `Cannot write ${path}: ${error.message}` }),
						),
					);
				return yield* reloadUnlocked;
			}),
		);

	return { snapshot, currentVersion, render, reload, save, get } satisfies PromptStoreService;
});

/**
 * Live PromptStore. Fails to build if the required templates cannot be loaded.
 */
export const PromptStoreLive: Layer.Layer<
	PromptStore,
	PromptError,
	Config | FileSystem.FileSystem
> = Layer.effect(PromptStore, make);
