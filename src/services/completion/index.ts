/**
 * @fileoverview Completion adapter.
 *
 * @module
 */

export {
	CompletionClient,
	CompletionClientLive,
	type CompletionClientService,
	type CompletionPrompt,
	type ReplyDraft,
	parseReplyDraft,
} from "./client.js";
