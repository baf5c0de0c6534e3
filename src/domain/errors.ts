/**
 * Domain-specific errors for the reply drafter.
 * Uses Effect's Data.TaggedError for type-safe error handling.
 */
import { Data } from "effect";

/**
 * Failure talking to an external collaborator (chat platform or completion API).
 */
export class TransportError extends Data.TaggedError("TransportError")<{
	readonly source: "chat" | "completion";
	readonly kind: "network" | "auth" | "rate_limit" | "timeout";
	readonly message: string;
	readonly cause?: unknown;
}> {}

/**
 * The completion service answered, but the answer is unusable.
 */
export class ServiceError extends Data.TaggedError("ServiceError")<{
	readonly kind: "api" | "malformed_output" | "empty_output";
	readonly message: string;
	readonly status?: number;
}> {}

/**
 * The chat already holds as many undecided suggestions as allowed.
 */
export class ThrottledError extends Data.TaggedError("ThrottledError")<{
	readonly chatId: string;
	readonly pending: number;
	readonly limit: number;
}> {
	override get message(): string {
		return `Chat ${this.chatId} has ${this.pending} pending suggestion(s), limit is ${this.limit}`;
	}
}

/**
 * A suggestion was created for the chat too recently.
 */
export class CoolingDownError extends Data.TaggedError("CoolingDownError")<{
	readonly chatId: string;
	readonly until: Date;
}> {
	override get message(): string {
		return `Chat ${this.chatId} is cooling down until ${this.until.toISOString()}`;
	}
}

/**
 * The message window has not changed since the last successful cycle.
 */
export class UnchangedError extends Data.TaggedError("UnchangedError")<{
	readonly chatId: string;
	readonly fingerprint: string;
}> {
	override get message(): string {
		return `No new messages in chat ${this.chatId}`;
	}
}

/**
 * The newest message in the window is our own; nothing to answer yet.
 */
export class AwaitingIncomingError extends Data.TaggedError("AwaitingIncomingError")<{
	readonly chatId: string;
}> {
	override get message(): string {
		return `Last message in chat ${this.chatId} is outgoing`;
	}
}

/**
 * A decision was attempted on a suggestion that is no longer pending.
 */
export class InvalidStateError extends Data.TaggedError("InvalidStateError")<{
	readonly suggestionId: number;
	readonly status: string;
	readonly attemptedAction: string;
}> {
	override get message(): string {
		return `Cannot ${this.attemptedAction} suggestion ${this.suggestionId}: status is '${this.status}'`;
	}
}

export class NotFoundError extends Data.TaggedError("NotFoundError")<{
	readonly entity: "suggestion" | "chat" | "prompt";
	readonly id: string;
}> {
	override get message(): string {
		return `${this.entity} not found: ${this.id}`;
	}
}

/**
 * A prompt template is missing, malformed, or references an unknown placeholder.
 */
export class PromptError extends Data.TaggedError("PromptError")<{
	readonly name: string;
	readonly message: string;
}> {}

/**
 * Suggestion outcomes that are skips rather than failures.
 */
export const SKIP_TAGS = [
	"UnchangedError",
	"ThrottledError",
	"CoolingDownError",
	"AwaitingIncomingError",
] as const;

export type SkipTag = (typeof SKIP_TAGS)[number];

export const isSkip = (error: { readonly _tag: string }): boolean =>
	SKIP_TAGS.some((tag) => tag === error._tag);
