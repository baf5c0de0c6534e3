/**
 * @fileoverview Completion client for OpenAI-compatible chat-completions APIs.
 *
 * Sends a system + user prompt pair and validates that the model answered
 * with a JSON object holding `reply` and `translation`, and optionally
 * `reply_to_message_id`.
 *
 * @module
 */

import {
	HttpClient,
	type HttpClientError,
	HttpClientRequest,
	type HttpClientResponse,
} from "@effect/platform";
import { Context, Duration, Effect, Layer, Redacted, Schema } from "effect";
import { Config } from "../../config/index.js";
import { ServiceError, TransportError } from "../../domain/errors.js";

// =============================================================================
// Types
// =============================================================================

export interface CompletionPrompt {
	readonly system: string;
	readonly user: string;
}

/**
 * A validated model answer.
 */
export interface ReplyDraft {
	readonly replyText: string;
	readonly translationText: string;
	/** Message id the model chose to answer, unchecked against the window */
	readonly replyToMessageId: string | null;
}

/**
 * The subset of the chat-completions response the client reads.
 */
const ChatCompletionResponseSchema = Schema.Struct({
	choices: Schema.Array(
		Schema.Struct({
			message: Schema.Struct({
				content: Schema.NullishOr(Schema.String),
			}),
		}),
	),
});

const NonBlankString = Schema.String.pipe(
	Schema.filter((value) => value.trim().length > 0, { message: () => "must not be blank" }),
);

/**
 * The object the model is instructed to return. Extra keys are rejected.
 */
const ReplyDraftSchema = Schema.Struct({
	reply: NonBlankString,
	translation: NonBlankString,
	reply_to_message_id: Schema.optional(
		Schema.NullOr(Schema.Union(Schema.String, Schema.Number.pipe(Schema.int()))),
	),
});

const decodeReplyDraft = Schema.decodeUnknown(Schema.parseJson(ReplyDraftSchema), {
	onExcessProperty: "error",
});

// =============================================================================
// Output Validation
// =============================================================================

/**
 * Validates raw model output into a ReplyDraft.
 *
 * Accepts the JSON object optionally wrapped in a markdown code fence.
 * Anything else fails with ServiceError (`empty_output` or `malformed_output`).
 */
export const parseReplyDraft = (
	content: string | null | undefined,
): Effect.Effect<ReplyDraft, ServiceError> => {
	const text = (content ?? "").trim();
	if (text.length === 0) {
		return Effect.fail(
			new ServiceError({ kind: "empty_output", message: "Model returned an empty answer" }),
		);
	}

	const unfenced = text.replace(/^```(?:json)?\s*([\s\S]*?)\s*```$/, "$1");

	return decodeReplyDraft(unfenced).pipe(
		Effect.map((draft) => ({
			replyText: draft.reply.trim(),
			translationText: draft.translation.trim(),
			replyToMessageId:
				draft.reply_to_message_id === undefined || draft.reply_to_message_id === null
					? null
					: String(draft.reply_to_message_id),
		})),
		Effect.mapError(
			(error) =>
				new ServiceError({
					kind: "malformed_output",
					message: `Model output is not a {reply, translation} object: ${error.message}`,
				}),
		),
	);
};

// =============================================================================
// Error Mapping
// =============================================================================

const mapResponseStatus = (response: HttpClientResponse.HttpClientResponse, body: string) => {
	const status = response.status;

	if (status === 401 || status === 403) {
		return new TransportError({
			source: "completion",
			kind: "auth",
			message: status === 401 ? "Invalid or missing API key" : "Access forbidden",
		});
	}

	if (status === 429) {
		return new TransportError({
			source: "completion",
			kind: "rate_limit",
			message: "Completion API rate limit exceeded",
		});
	}

	return new ServiceError({
		kind: "api",
		status,
		message: `Completion API error (${status}): ${body.slice(0, 500)}`,
	});
};

const mapRequestError = (error: HttpClientError.HttpClientError): TransportError =>
	new TransportError({
		source: "completion",
		kind: "network",
		message: error.message,
		cause: error,
	});

// =============================================================================
// Service
// =============================================================================

export interface CompletionClientService {
	/**
	 * Requests one reply draft. Bounded by `completion.timeout_seconds`.
	 */
	readonly complete: (
		prompt: CompletionPrompt,
	) => Effect.Effect<ReplyDraft, TransportError | ServiceError>;
}

export class CompletionClient extends Context.Tag("reply-drafter/CompletionClient")<
	CompletionClient,
	CompletionClientService
>() {}

const make = Effect.gen(function* () {
	const { completion } = yield* Config;
	const httpClient = yield* HttpClient.HttpClient;

	const client = httpClient.pipe(
		HttpClient.mapRequest(
			HttpClientRequest.setHeader("Authorization", `Bearer ${Redacted.value(completion.apiKey)}`),
		),
	);

	const complete: CompletionClientService["complete"] = (prompt) =>
		Effect.gen(function* () {
			const request = HttpClientRequest.post(`${completion.baseUrl}/chat/completions`).pipe(
				HttpClientRequest.bodyUnsafeJson({
					model: completion.model,
					temperature: completion.temperature,
					max_tokens: completion.maxOutputTokens,
					response_format: { type: "json_object" },
					messages: [
						{ role: "system", content: prompt.system },
						{ role: "user", content: prompt.user },
					],
				}),
			);

			const response = yield* client.execute(request).pipe(Effect.mapError(mapRequestError));

			if (response.status >= 400) {
				const body = yield* response.text.pipe(Effect.orElseSucceed(() => ""));
				return yield* Effect.fail(mapResponseStatus(response, body));
			}

			const json = yield* response.json.pipe(
				Effect.mapError(
					() =>
						new ServiceError({
							kind: "api",
							status: response.status,
							message: "Failed to parse response JSON",
						}),
				),
			);

			const data = yield* Schema.decodeUnknown(ChatCompletionResponseSchema)(json).pipe(
				Effect.mapError(
					(error) =>
						new ServiceError({
							kind: "api",
							status: response.status,
							message: `Unexpected response shape: ${error.message}`,
						}),
				),
			);

			return yield* parseReplyDraft(data.choices[0]?.message.content);
		}).pipe(
			Effect.timeoutFail({
				duration: Duration.seconds(completion.timeoutSeconds),
				onTimeout: () =>
					new TransportError({
						source: "completion",
						kind: "timeout",
						message: `Completion request timed out after ${completion.timeoutSeconds}s`,
					}),
			}),
		);

	return { complete } satisfies CompletionClientService;
});

/**
 * Live CompletionClient. Requires Config and an HttpClient (FetchHttpClient in production).
 */
export const CompletionClientLive: Layer.Layer<
	CompletionClient,
	never,
	Config | HttpClient.HttpClient
> = Layer.effect(CompletionClient, make);
