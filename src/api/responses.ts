/**
 * @fileoverview JSON response shapes shared by the API handlers.
 */

import { HttpServerResponse } from "@effect/platform";
import { Option, ParseResult } from "effect";
import type { Chat } from "../domain/chat.js";
import type { Suggestion } from "../domain/suggestion.js";
import type { PromptSnapshot } from "../services/prompts/index.js";
import type { SchedulerStatus, TickReport } from "../services/scheduler/index.js";

// =============================================================================
// Errors
// =============================================================================

export type ErrorCode =
	| "VALIDATION_ERROR"
	| "NOT_FOUND"
	| "INVALID_STATE"
	| "CHAT_ERROR"
	| "PROMPT_ERROR"
	| "UNAUTHORIZED"
	| "INTERNAL_ERROR";

export const errorResponse = (status: number, code: ErrorCode, message: string) =>
	HttpServerResponse.json({ error: { code, message } }, { status });

export const validationError = (error: ParseResult.ParseError) =>
	errorResponse(400, "VALIDATION_ERROR", ParseResult.TreeFormatter.formatErrorSync(error));

export const internalError = (error: { readonly message: string }) =>
	errorResponse(500, "INTERNAL_ERROR", error.message);

// =============================================================================
// Response Mappers
// =============================================================================

export const mapSuggestion = (suggestion: Suggestion, chatTitle: string | null) => ({
	id: suggestion.id,
	chatId: suggestion.chatId,
	chatTitle,
	suggestedText: suggestion.suggestedText,
	translatedText: suggestion.translatedText,
	status: suggestion.status,
	sourceMessages: suggestion.sourceMessages.map((message) => ({
		id: message.id,
		text: message.text,
		outgoing: message.outgoing,
		sender: message.sender,
		sentAt: message.sentAt.toISOString(),
	})),
	replyToMessageId: suggestion.replyToMessageId,
	createdAt: suggestion.createdAt.toISOString(),
	decidedAt: suggestion.decidedAt?.toISOString() ?? null,
});

export const mapChat = (chat: Chat) => ({
	id: chat.id,
	title: chat.title,
	languageHint: chat.languageHint,
	isSelected: chat.isSelected,
	lastSuccessfulRunAt: chat.lastSuccessfulRunAt?.toISOString() ?? null,
	updatedAt: chat.updatedAt.toISOString(),
});

export const mapPromptSnapshot = (snapshot: PromptSnapshot) => ({
	version: snapshot.version,
	loadedAt: snapshot.loadedAt.toISOString(),
	prompts: Array.from(snapshot.templates.values(), (template) => ({
		name: template.name,
		role: template.role,
		content: template.content,
	})),
});

export const mapTickReport = (report: TickReport) => ({
	trigger: report.trigger,
	startedAt: report.startedAt.toISOString(),
	finishedAt: report.finishedAt.toISOString(),
	pollIntervalMinutes: report.pollIntervalMinutes,
	created: report.created,
	skipped: report.skipped,
	failed: report.failed,
	interrupted: report.interrupted,
	outcomes: report.outcomes,
});

export const mapSchedulerStatus = (status: SchedulerStatus) => ({
	state: status.state,
	nextTickAt: Option.getOrNull(Option.map(status.nextTickAt, (date) => date.toISOString())),
	lastReport: Option.getOrNull(Option.map(status.lastReport, mapTickReport)),
});
