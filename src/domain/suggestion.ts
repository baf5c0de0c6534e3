/**
 * Suggestion domain model and decision state machine.
 *
 * @module
 */

import { Data, Effect, Match, Schema } from "effect";
import type { ChatMessage } from "./chat.js";
import { InvalidStateError } from "./errors.js";

// =============================================================================
// Status
// =============================================================================

export const SuggestionStatusSchema = Schema.Literal("pending", "sent", "declined");

/**
 * Lifecycle of a suggestion. `sent` and `declined` are terminal.
 */
export type SuggestionStatus = typeof SuggestionStatusSchema.Type;

export type DecidedStatus = Exclude<SuggestionStatus, "pending">;

// =============================================================================
// Entity
// =============================================================================

/**
 * A drafted reply awaiting (or past) operator review.
 */
export interface Suggestion {
	readonly id: number;
	readonly chatId: string;
	/** Reply in the conversation's language; this is what gets sent */
	readonly suggestedText: string;
	/** Translation shown to the operator only */
	readonly translatedText: string;
	readonly status: SuggestionStatus;
	/** Fingerprint of the message window the suggestion was drafted from */
	readonly fingerprint: string;
	readonly sourceMessages: readonly ChatMessage[];
	/** Incoming source message the model chose to answer, if any */
	readonly replyToMessageId: string | null;
	readonly createdAt: Date;
	readonly decidedAt: Date | null;
}

export interface NewSuggestion {
	readonly chatId: string;
	readonly suggestedText: string;
	readonly translatedText: string;
	readonly fingerprint: string;
	readonly sourceMessages: readonly ChatMessage[];
	readonly replyToMessageId: string | null;
	readonly createdAt: Date;
}

// =============================================================================
// Decision
// =============================================================================

/**
 * Operator action on a pending suggestion. SendReply posts the text as a
 * reply to one of the incoming source messages.
 */
export type Decision = Data.TaggedEnum<{
	Send: {};
	SendReply: {};
	Decline: {};
}>;

export const Decision = Data.taggedEnum<Decision>();

/**
 * Action name used in log lines and error messages, e.g. `send-reply`.
 */
export const decisionAction = (decision: Decision): string =>
	Match.value(decision).pipe(
		Match.tag("Send", () => "send"),
		Match.tag("SendReply", () => "send-reply"),
		Match.tag("Decline", () => "decline"),
		Match.exhaustive,
	);

// =============================================================================
// Reply Target
// =============================================================================

const QUESTION = /[?？¿]/;
const WORD = /[\p{L}\p{N}_]/u;

/**
 * Scores an incoming message as a reply target: newer is better, questions
 * get +50, and very short or wordless messages lose 25 each.
 */
const replyScore = (message: ChatMessage, index: number): number => {
	const text = message.text.trim();
	let score = index;
	if (QUESTION.test(text)) {
		score += 50;
	}
	if (text.length < 3) {
		score -= 25;
	}
	if (!WORD.test(text)) {
		score -= 25;
	}
	return score;
};

/**
 * The source message a SendReply answers: the stored choice when there is
 * one, otherwise the best-scoring incoming message (the earliest on a tie).
 * Null when the window holds no incoming message.
 */
export const replyTarget = (
	suggestion: Pick<Suggestion, "replyToMessageId" | "sourceMessages">,
): string | null => {
	if (suggestion.replyToMessageId !== null) {
		return suggestion.replyToMessageId;
	}
	let best: string | null = null;
	let bestScore = Number.NEGATIVE_INFINITY;
	for (const [index, message] of suggestion.sourceMessages.entries()) {
		if (message.outgoing) {
			continue;
		}
		const score = replyScore(message, index);
		if (score > bestScore) {
			best = message.id;
			bestScore = score;
		}
	}
	return best;
};

// =============================================================================
// State Machine Transition
// =============================================================================

/**
 * Valid transitions:
 * | From    | Decision  | To       |
 * |---------|-----------|----------|
 * | pending | Send      | sent     |
 * | pending | SendReply | sent     |
 * | pending | Decline   | declined |
 *
 * Anything else fails with InvalidStateError.
 */
export const transition = (
	suggestion: Pick<Suggestion, "id" | "status">,
	decision: Decision,
): Effect.Effect<DecidedStatus, InvalidStateError> =>
	suggestion.status === "pending"
		? Effect.succeed(
				Match.value(decision).pipe(
					Match.tag("Send", (): DecidedStatus => "sent"),
					Match.tag("SendReply", (): DecidedStatus => "sent"),
					Match.tag("Decline", (): DecidedStatus => "declined"),
					Match.exhaustive,
				),
			)
		: Effect.fail(
				new InvalidStateError({
					suggestionId: suggestion.id,
					status: suggestion.status,
					attemptedAction: decisionAction(decision),
				}),
			);
